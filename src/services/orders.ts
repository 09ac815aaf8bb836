import { CrmStore } from "../store/types";
import { ORDER_SORT_FIELDS, RelatedIdLookup, buildOrderFilter } from "../filters/orders";
import { buildPagination, parseOrderBy, toListOptions } from "../filters/listing";
import { AppError, toFieldErrors } from "../utils/errors";
import { sumDecimals } from "../utils/money";
import { parseWith } from "../validation/common";
import { orderInputSchema } from "../validation/orders";
import { orderQuerySchema } from "../validation/queries";
import { FieldError, ListResult, OrderDetail, OrderPayload } from "../types/crm";

const rejected = (errors: FieldError[]): OrderPayload => ({
  order: null,
  message: "Validation failed",
  errors,
});

/**
 * Recomputes totalAmount from the current prices of the order's products and
 * stores it. The total is a snapshot: later price changes do not touch it
 * until this runs again.
 */
const applyTotal = async (store: CrmStore, orderId: string): Promise<OrderDetail> => {
  const order = await store.orders.findById(orderId);
  if (!order) {
    throw AppError.notFound("id", "Order not found");
  }

  const total = sumDecimals(order.products.map((product) => product.price));
  const updated = await store.orders.setTotal(orderId, total);
  if (!updated) {
    throw AppError.notFound("id", "Order not found");
  }
  return updated;
};

export const createOrder = async (store: CrmStore, input: unknown): Promise<OrderPayload> => {
  const parsed = parseWith(orderInputSchema, input);
  if (!parsed.success) {
    return rejected(parsed.errors);
  }

  const { customerId, productIds, orderDate } = parsed.data;

  const customer = await store.customers.findById(customerId);
  if (!customer) {
    return rejected([{ field: "customerId", message: "Invalid customer ID" }]);
  }

  // Products form a set: repeating an id does not add it twice
  const requested = [...new Set(productIds)];
  if (requested.length === 0) {
    return rejected([{ field: "productIds", message: "At least one product must be selected" }]);
  }

  const products = await store.products.findByIds(requested);
  const found = new Set(products.map((product) => product.id));
  const missing = requested.filter((id) => !found.has(id));
  if (missing.length > 0) {
    return rejected([{ field: "productIds", message: `Invalid product IDs: ${missing.join(", ")}` }]);
  }

  try {
    const order = await store.transaction(async (tx) => {
      const created = await tx.orders.create({
        customerId: customer.id,
        productIds: requested,
        orderDate: orderDate ?? new Date(),
      });
      return applyTotal(tx, created.id);
    });

    console.log(`✅ Created order ${order.id} for ${customer.name} with total: $${order.totalAmount}`);
    return {
      order,
      message: `Order created successfully with total amount $${order.totalAmount}`,
      errors: [],
    };
  } catch (error) {
    return {
      order: null,
      message: "Failed to create order",
      errors: toFieldErrors(error, "Failed to create order"),
    };
  }
};

export const recalculateOrderTotal = async (
  store: CrmStore,
  orderId: string
): Promise<OrderPayload> => {
  try {
    const order = await store.transaction((tx) => applyTotal(tx, orderId));
    return {
      order,
      message: `Order total recalculated: $${order.totalAmount}`,
      errors: [],
    };
  } catch (error) {
    return {
      order: null,
      message: "Failed to recalculate order total",
      errors: toFieldErrors(error, "Failed to recalculate order total"),
    };
  }
};

const relatedIds = (store: CrmStore): RelatedIdLookup => ({
  customerIdsByName: (fragment) => store.customers.idsWithNameContaining(fragment),
  productIdsByName: (fragment) => store.products.idsWithNameContaining(fragment),
});

export const listOrders = async (
  store: CrmStore,
  query: unknown
): Promise<ListResult<OrderDetail>> => {
  const parsed = parseWith(orderQuerySchema, query);
  if (!parsed.success) {
    throw AppError.validation(parsed.errors);
  }

  const { orderBy, page, limit, ...criteria } = parsed.data;
  const sort = parseOrderBy(orderBy, ORDER_SORT_FIELDS, { orderDate: -1 });
  const filter = await buildOrderFilter(criteria, relatedIds(store));
  const result = await store.orders.find(filter, toListOptions(sort, page, limit));

  return { items: result.items, pagination: buildPagination(page, limit, result.total) };
};

export const getOrder = (store: CrmStore, id: string): Promise<OrderDetail | null> =>
  store.orders.findById(id);
