import { IOrder } from "../models/Order";
import { isObjectIdString } from "../utils/text";
import { Predicate, composePredicates, isPresent } from "./compose";

export interface OrderCriteria {
  totalAmountGte?: number;
  totalAmountLte?: number;
  orderDateGte?: Date;
  orderDateLte?: Date;
  customerName?: string;
  productName?: string;
  productId?: string;
}

/** Resolves related-record criteria to the ids they match. */
export interface RelatedIdLookup {
  customerIdsByName(fragment: string): Promise<string[]>;
  productIdsByName(fragment: string): Promise<string[]>;
}

export const ORDER_SORT_FIELDS = ["totalAmount", "orderDate", "createdAt", "updatedAt"] as const;

type OrderPredicateFactory = (
  criteria: OrderCriteria,
  lookup: RelatedIdLookup
) => Predicate<IOrder> | null | Promise<Predicate<IOrder> | null>;

const orderPredicates: OrderPredicateFactory[] = [
  ({ totalAmountGte }) =>
    isPresent(totalAmountGte) ? { totalAmount: { $gte: totalAmountGte } } : null,
  ({ totalAmountLte }) =>
    isPresent(totalAmountLte) ? { totalAmount: { $lte: totalAmountLte } } : null,
  ({ orderDateGte }) => (isPresent(orderDateGte) ? { orderDate: { $gte: orderDateGte } } : null),
  ({ orderDateLte }) => (isPresent(orderDateLte) ? { orderDate: { $lte: orderDateLte } } : null),
  async ({ customerName }, lookup) =>
    isPresent(customerName)
      ? { customer: { $in: await lookup.customerIdsByName(customerName) } }
      : null,
  async ({ productName }, lookup) =>
    isPresent(productName)
      ? { products: { $in: await lookup.productIdsByName(productName) } }
      : null,
  // A malformed id cannot match any product
  ({ productId }) => {
    if (!isPresent(productId)) {
      return null;
    }
    return isObjectIdString(productId) ? { products: productId } : { products: { $in: [] } };
  },
];

export const buildOrderFilter = async (
  criteria: OrderCriteria,
  lookup: RelatedIdLookup
): Promise<Predicate<IOrder>> =>
  composePredicates(
    await Promise.all(orderPredicates.map((factory) => factory(criteria, lookup)))
  );
