import { z } from "zod";
import { REQUIRED_MESSAGE } from "./common";
import { fractionDigits, isZero, normalizeDecimal, parseDecimal, wholeDigits } from "../utils/money";

export const PRICE_POSITIVE_MESSAGE = "Price must be positive";
export const STOCK_NEGATIVE_MESSAGE = "Stock cannot be negative";

// Stored like a DECIMAL(10, 2) column
const MAX_WHOLE_DIGITS = 8;
const MAX_FRACTION_DIGITS = 2;

/** Returns the problem with a price, or null when it is acceptable. */
export const checkPrice = (raw: string): string | null => {
  const parsed = parseDecimal(raw);
  if (!parsed) {
    return "Enter a valid number";
  }
  if (parsed.negative || isZero(parsed)) {
    return PRICE_POSITIVE_MESSAGE;
  }
  if (fractionDigits(parsed) > MAX_FRACTION_DIGITS) {
    return "Price must have at most 2 decimal places";
  }
  if (wholeDigits(parsed) > MAX_WHOLE_DIGITS) {
    return "Price must have at most 10 digits in total";
  }
  return null;
};

export const productInputSchema = z.object({
  name: z
    .string({ required_error: REQUIRED_MESSAGE })
    .trim()
    .min(1, REQUIRED_MESSAGE)
    .max(255, "Ensure this field has no more than 255 characters"),
  price: z
    .union([z.string(), z.number()], {
      errorMap: (_issue, ctx) => ({
        message: ctx.data === undefined ? REQUIRED_MESSAGE : "Enter a valid number",
      }),
    })
    .transform((value) => String(value).trim())
    .superRefine((value, ctx) => {
      const problem = checkPrice(value);
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    })
    .transform((value) => (checkPrice(value) ? value : normalizeDecimal(value))),
  stock: z
    .number({ invalid_type_error: "Stock must be a whole number" })
    .int("Stock must be a whole number")
    .min(0, STOCK_NEGATIVE_MESSAGE)
    .nullish()
    .transform((stock) => stock ?? 0),
});

export type ProductInput = z.input<typeof productInputSchema>;
