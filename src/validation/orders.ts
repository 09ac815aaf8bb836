import { z } from "zod";
import { REQUIRED_MESSAGE, idSchema } from "./common";

export const orderInputSchema = z.object({
  customerId: idSchema.pipe(z.string().min(1, REQUIRED_MESSAGE)),
  productIds: z.array(idSchema, {
    required_error: REQUIRED_MESSAGE,
    invalid_type_error: "Expected a list of product IDs",
  }),
  orderDate: z.coerce
    .date({ errorMap: () => ({ message: "Enter a valid date/time" }) })
    .nullish(),
});

export type OrderInput = z.input<typeof orderInputSchema>;
