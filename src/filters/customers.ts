import { ICustomer } from "../models/Customer";
import { Predicate, PredicateFactory, applyFactories, containsText, isPresent, startsWithText } from "./compose";

export interface CustomerCriteria {
  nameIcontains?: string;
  emailIcontains?: string;
  createdAtGte?: Date;
  createdAtLte?: Date;
  phonePattern?: string;
}

export const CUSTOMER_SORT_FIELDS = ["name", "email", "phone", "createdAt", "updatedAt"] as const;

const customerPredicates: Array<PredicateFactory<CustomerCriteria, ICustomer>> = [
  ({ nameIcontains }) => (isPresent(nameIcontains) ? { name: containsText(nameIcontains) } : null),
  ({ emailIcontains }) => (isPresent(emailIcontains) ? { email: containsText(emailIcontains) } : null),
  ({ createdAtGte }) => (isPresent(createdAtGte) ? { createdAt: { $gte: createdAtGte } } : null),
  ({ createdAtLte }) => (isPresent(createdAtLte) ? { createdAt: { $lte: createdAtLte } } : null),
  // Literal prefix, e.g. "+1"; the value is not treated as a pattern
  ({ phonePattern }) => (isPresent(phonePattern) ? { phone: startsWithText(phonePattern) } : null),
];

export const buildCustomerFilter = (criteria: CustomerCriteria): Predicate<ICustomer> =>
  applyFactories(customerPredicates, criteria);
