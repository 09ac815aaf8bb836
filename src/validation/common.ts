import { z } from "zod";
import { FieldError } from "../types/crm";
import { isObjectIdString } from "../utils/text";

export const REQUIRED_MESSAGE = "This field is required";

/** Flattens zod issues into field errors; the path is joined with dots. */
export const issuesToFieldErrors = (error: z.ZodError): FieldError[] =>
  error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "input",
    message: issue.message,
  }));

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldError[] };

export const parseWith = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): ParseResult<z.output<S>> => {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: issuesToFieldErrors(result.error) };
};

// Record ids arrive as strings, or as numbers from loosely typed clients.
// ObjectIds are compared in the lower-case hex that the driver prints.
export const idSchema = z
  .union([z.string(), z.number()], {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined ? REQUIRED_MESSAGE : "Enter a valid ID",
    }),
  })
  .transform((value) => {
    const id = String(value).trim();
    return isObjectIdString(id) ? id.toLowerCase() : id;
  });
