import { Router } from "express";
import type { TreasureReader } from "../db/TreasureReader.js";
import type { TreasureWriter } from "../db/TreasureWriter.js";
import { notFound, unprocessable } from "../errors/ApiError.js";
import { translateDbError } from "../errors/translateDbError.js";
import type { ApiLogger } from "../logging/ApiLogger.js";
import {
  parseNewPrice,
  parseNewTreasure,
  parseTreasureId,
  parseTreasureQuery,
} from "../query/treasureRequest.schemas.js";
import { toTreasureJson, toTreasureListingJson } from "./serializers.js";

export interface TreasuresRouterDeps {
  reader: TreasureReader;
  writer: TreasureWriter;
  logger: ApiLogger;
}

const missingTreasure = (id: number) =>
  notFound(`There is no treasure with id ${id}`);

/**
 * Routes mounted at /api/treasures.
 */
export const createTreasuresRouter = ({
  reader,
  writer,
  logger,
}: TreasuresRouterDeps): Router => {
  const router = Router();

  router.get("/", (req, res) => {
    const query = parseTreasureQuery(req.query);
    const treasures = reader.listTreasures(query).map(toTreasureListingJson);
    res.json({ treasures });
  });

  router.post("/", async (req, res) => {
    const newTreasure = parseNewTreasure(req.body);

    const created = await writer
      .addTreasure(newTreasure)
      .catch((error: unknown) => {
        throw translateDbError(error, { shopId: newTreasure.shopId });
      });

    res.status(201).json({ treasure: toTreasureJson(created) });
  });

  // Read-then-write without a transaction: concurrent patches can race
  router.patch("/:treasure_id", async (req, res) => {
    const id = parseTreasureId(req.params.treasure_id);
    const price = parseNewPrice(req.body);

    const current = reader.getTreasure(id);
    if (!current) {
      throw missingTreasure(id);
    }
    if (price >= current.costAtAuction) {
      throw unprocessable(
        `The current price is ${current.costAtAuction}, please enter a lower price`,
      );
    }

    if (!(await writer.updatePrice(id, price))) {
      throw missingTreasure(id);
    }
    res.status(204).end();
  });

  router.delete("/:treasure_id", async (req, res) => {
    const id = parseTreasureId(req.params.treasure_id);

    if (!(await writer.deleteTreasure(id))) {
      throw missingTreasure(id);
    }

    logger.info(`treasure ${id} has been deleted`);
    res.status(204).end();
  });

  return router;
};
