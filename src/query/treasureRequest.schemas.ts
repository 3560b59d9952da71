import { z } from "zod";
import {
  type NewTreasure,
  SORT_FIELDS,
  SORT_ORDERS,
  type SortField,
  type SortOrder,
  type TreasureQuery,
} from "../db/Types.js";
import { unprocessable } from "../errors/ApiError.js";

const isSortField = (value: string): value is SortField =>
  (SORT_FIELDS as readonly string[]).includes(value);

const isSortOrder = (value: string): value is SortOrder =>
  (SORT_ORDERS as readonly string[]).includes(value);

/** Integer query/path parameter, still a string on the wire. */
const integerParam = z
  .string()
  .regex(/^-?\d+$/, { message: "Expected an integer" })
  .transform(Number)
  .pipe(z.number().safe({ message: "Expected an integer" }));

const DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Numbers in JSON bodies may arrive as plain decimal strings ("666", "7.25").
 * Hex, binary and exponent forms stay strings and are rejected.
 */
const numberLike = (schema: z.ZodNumber) =>
  z.preprocess(
    (value) =>
      typeof value === "string" && DECIMAL.test(value.trim())
        ? Number(value)
        : value,
    schema,
  );

// --- Schemas ---

export const ListTreasuresQuerySchema = z.object({
  sort_by: z
    .string()
    .default("age")
    .refine(isSortField, (value) => ({
      message: `Invalid sort field: ${value}`,
    })),
  order: z
    .string()
    .default("asc")
    .refine(isSortOrder, (value) => ({
      message: `Invalid order field: ${value}`,
    })),
  // An empty colour means no filter
  colour: z
    .string()
    .optional()
    .transform((colour) => colour || undefined),
  min_age: integerParam.optional(),
  max_age: integerParam.optional(),
});

export const NewTreasureBodySchema = z.object({
  treasure_name: z.string(),
  colour: z.string(),
  age: numberLike(z.number().int().nonnegative()),
  cost_at_auction: numberLike(z.number().finite().nonnegative()),
  // Unknown shops are rejected by the foreign key, not here
  shop_id: numberLike(z.number().int()),
});

export const NewPriceBodySchema = z.object({
  cost_at_auction: numberLike(z.number().finite().nonnegative()),
});

export const TreasureIdParamSchema = integerParam;

// --- Parsing ---

/**
 * First issue as a single line. Refinements carry a full sentence;
 * other issues are prefixed with the field path.
 */
export const formatZodError = (error: z.ZodError): string => {
  const issue = error.issues[0];
  if (!issue) {
    return "Invalid request";
  }
  if (issue.code === z.ZodIssueCode.custom || issue.path.length === 0) {
    return issue.message;
  }
  return `${issue.path.join(".")}: ${issue.message}`;
};

const parseOrReject = <S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): z.output<S> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw unprocessable(formatZodError(result.error));
  }
  return result.data;
};

/**
 * Validate listing query parameters.
 *
 * @throws ApiError (422) for an unknown sort field or order, or a non-integer age bound
 */
export const parseTreasureQuery = (query: unknown): TreasureQuery => {
  const { sort_by, order, colour, min_age, max_age } = parseOrReject(
    ListTreasuresQuerySchema,
    query,
  );
  return {
    sortBy: sort_by,
    order,
    colour,
    minAge: min_age,
    maxAge: max_age,
  };
};

export const parseNewTreasure = (body: unknown): NewTreasure => {
  const parsed = parseOrReject(NewTreasureBodySchema, body);
  return {
    name: parsed.treasure_name,
    colour: parsed.colour,
    age: parsed.age,
    costAtAuction: parsed.cost_at_auction,
    shopId: parsed.shop_id,
  };
};

export const parseNewPrice = (body: unknown): number =>
  parseOrReject(NewPriceBodySchema, body).cost_at_auction;

export const parseTreasureId = (raw: unknown): number => {
  const result = TreasureIdParamSchema.safeParse(raw);
  if (!result.success) {
    throw unprocessable(`treasure_id: ${formatZodError(result.error)}`);
  }
  return result.data;
};
