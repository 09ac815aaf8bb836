import { z } from "zod";

const blankToUndefined = (value: unknown): unknown =>
  value === "" || value === null ? undefined : value;

// Query-string booleans follow the usual spellings: true/false, 1/0
const parseBooleanParam = (value: unknown): unknown => {
  if (value === undefined || value === null || value === "") return undefined;
  if (typeof value === "boolean") return value;
  const normalized = String(value).toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return value;
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// A bare date as an upper bound includes the whole day
const endOfDay = (value: unknown): unknown => {
  const present = blankToUndefined(value);
  return typeof present === "string" && DATE_ONLY.test(present)
    ? `${present}T23:59:59.999Z`
    : present;
};

const text = z.preprocess(
  blankToUndefined,
  z.string({ invalid_type_error: "Enter a single value" }).optional()
);

const decimal = z.preprocess(
  blankToUndefined,
  z.coerce
    .number({ invalid_type_error: "Enter a number" })
    .finite("Enter a number")
    .optional()
);

const integer = z.preprocess(
  blankToUndefined,
  z.coerce
    .number({ invalid_type_error: "Enter a whole number" })
    .int("Enter a whole number")
    .optional()
);

const flag = z.preprocess(
  parseBooleanParam,
  z.boolean({ invalid_type_error: "Enter true or false" }).optional()
);

const dateError = { errorMap: () => ({ message: "Enter a valid date" }) };
const dateFrom = z.preprocess(blankToUndefined, z.coerce.date(dateError).optional());
const dateTo = z.preprocess(endOfDay, z.coerce.date(dateError).optional());

export const MAX_PAGE_SIZE = 200;
export const DEFAULT_PAGE_SIZE = 50;

const listing = {
  orderBy: text,
  page: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: "Enter a whole number" })
      .int("Enter a whole number")
      .min(1, "Page must be at least 1")
      .default(1)
  ),
  limit: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: "Enter a whole number" })
      .int("Enter a whole number")
      .min(1, "Limit must be at least 1")
      .max(MAX_PAGE_SIZE, `Limit must be at most ${MAX_PAGE_SIZE}`)
      .default(DEFAULT_PAGE_SIZE)
  ),
};

export const customerQuerySchema = z.object({
  nameIcontains: text,
  emailIcontains: text,
  createdAtGte: dateFrom,
  createdAtLte: dateTo,
  phonePattern: text,
  ...listing,
});

export const productQuerySchema = z.object({
  nameIcontains: text,
  priceGte: decimal,
  priceLte: decimal,
  stockGte: integer,
  stockLte: integer,
  stock: integer,
  lowStock: flag,
  ...listing,
});

export const orderQuerySchema = z.object({
  totalAmountGte: decimal,
  totalAmountLte: decimal,
  orderDateGte: dateFrom,
  orderDateLte: dateTo,
  customerName: text,
  productName: text,
  productId: text,
  ...listing,
});

export type CustomerQuery = z.output<typeof customerQuerySchema>;
export type ProductQuery = z.output<typeof productQuerySchema>;
export type OrderQuery = z.output<typeof orderQuerySchema>;
