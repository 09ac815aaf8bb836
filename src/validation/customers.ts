import { z } from "zod";
import { REQUIRED_MESSAGE } from "./common";

export const PHONE_PATTERN = /^\+?[\d\-()\s]+$/;
export const PHONE_FORMAT_MESSAGE =
  "Phone number must be in format: +1234567890 or 123-456-7890";
export const EMAIL_TAKEN_MESSAGE = "Email already exists";

// An empty phone means "no phone"
export const isValidPhone = (phone: string): boolean =>
  phone === "" || PHONE_PATTERN.test(phone);

export const customerInputSchema = z.object({
  name: z
    .string({ required_error: REQUIRED_MESSAGE })
    .trim()
    .min(1, REQUIRED_MESSAGE)
    .max(255, "Ensure this field has no more than 255 characters"),
  email: z
    .string({ required_error: REQUIRED_MESSAGE })
    .trim()
    .toLowerCase()
    .min(1, REQUIRED_MESSAGE)
    .pipe(z.string().email("Enter a valid email address")),
  phone: z
    .string()
    .refine(isValidPhone, PHONE_FORMAT_MESSAGE)
    .transform((phone) => phone.trim())
    .pipe(z.string().max(20, "Ensure this field has no more than 20 characters"))
    .nullish(),
});

export type CustomerInput = z.input<typeof customerInputSchema>;
export type ValidCustomerInput = z.output<typeof customerInputSchema>;

export const bulkCustomersSchema = z.array(z.unknown(), {
  required_error: REQUIRED_MESSAGE,
  invalid_type_error: "Expected a list of customers",
});
