import { CrmStore } from "../store/types";
import { CUSTOMER_SORT_FIELDS, buildCustomerFilter } from "../filters/customers";
import { buildPagination, parseOrderBy, toListOptions } from "../filters/listing";
import { AppError, toFieldErrors } from "../utils/errors";
import { parseWith } from "../validation/common";
import { EMAIL_TAKEN_MESSAGE, bulkCustomersSchema, customerInputSchema } from "../validation/customers";
import { customerQuerySchema } from "../validation/queries";
import {
  BulkCustomersPayload,
  CustomerPayload,
  CustomerRecord,
  FieldError,
  ListResult,
  NewCustomer,
  RowErrors,
} from "../types/crm";

type PreparedCustomer =
  | { success: true; data: NewCustomer }
  | { success: false; errors: FieldError[] };

const emailField = (input: unknown): unknown =>
  typeof input === "object" && input !== null && "email" in input ? input.email : undefined;

// Every field problem is collected, including uniqueness when the email itself is well-formed
const prepareCustomer = async (store: CrmStore, input: unknown): Promise<PreparedCustomer> => {
  const errors: FieldError[] = [];

  const email = customerInputSchema.shape.email.safeParse(emailField(input));
  if (email.success && (await store.customers.existsByEmail(email.data))) {
    errors.push({ field: "email", message: EMAIL_TAKEN_MESSAGE });
  }

  const parsed = parseWith(customerInputSchema, input);
  if (!parsed.success) {
    errors.push(...parsed.errors);
  }

  if (errors.length > 0 || !parsed.success) {
    return { success: false, errors };
  }

  const { name, phone } = parsed.data;
  return {
    success: true,
    data: { name, email: parsed.data.email, phone: phone || undefined },
  };
};

export const createCustomer = async (
  store: CrmStore,
  input: unknown
): Promise<CustomerPayload> => {
  const prepared = await prepareCustomer(store, input);
  if (!prepared.success) {
    return { customer: null, message: "Validation failed", errors: prepared.errors };
  }

  try {
    const customer = await store.customers.create(prepared.data);
    console.log(`✅ Created customer: ${customer.email}`);
    return {
      customer,
      message: `Customer '${customer.name}' created successfully`,
      errors: [],
    };
  } catch (error) {
    return {
      customer: null,
      message: "Failed to create customer",
      errors: toFieldErrors(error, "Failed to create customer"),
    };
  }
};

/**
 * Creates each row on its own: a failing row is reported by index and
 * skipped, and rows before and after it stay committed.
 */
export const bulkCreateCustomers = async (
  store: CrmStore,
  input: unknown
): Promise<BulkCustomersPayload> => {
  const rows = parseWith(bulkCustomersSchema, input);
  if (!rows.success) {
    throw AppError.validation(rows.errors);
  }

  const customers: CustomerRecord[] = [];
  const errors: RowErrors[] = [];

  // Rows run in order so each one sees the emails of the rows before it
  for (const [index, row] of rows.data.entries()) {
    const prepared = await prepareCustomer(store, row);
    if (!prepared.success) {
      errors.push({ index, errors: prepared.errors });
      continue;
    }

    try {
      customers.push(await store.customers.create(prepared.data));
    } catch (error) {
      errors.push({ index, errors: toFieldErrors(error, `Failed to create customer at row ${index}`) });
    }
  }

  console.log(`✅ Bulk customer import: ${customers.length} created, ${errors.length} rejected`);

  return {
    customers,
    message: `Created ${customers.length} of ${rows.data.length} customers`,
    errors,
  };
};

export const listCustomers = async (
  store: CrmStore,
  query: unknown
): Promise<ListResult<CustomerRecord>> => {
  const parsed = parseWith(customerQuerySchema, query);
  if (!parsed.success) {
    throw AppError.validation(parsed.errors);
  }

  const { orderBy, page, limit, ...criteria } = parsed.data;
  const sort = parseOrderBy(orderBy, CUSTOMER_SORT_FIELDS, { name: 1 });
  const result = await store.customers.find(
    buildCustomerFilter(criteria),
    toListOptions(sort, page, limit)
  );

  return { items: result.items, pagination: buildPagination(page, limit, result.total) };
};

export const getCustomer = (store: CrmStore, id: string): Promise<CustomerRecord | null> =>
  store.customers.findById(id);
