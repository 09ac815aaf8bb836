import { IProduct } from "../models/Product";
import { Predicate, PredicateFactory, applyFactories, containsText, isPresent } from "./compose";

export const LOW_STOCK_THRESHOLD = 10;

export interface ProductCriteria {
  nameIcontains?: string;
  priceGte?: number;
  priceLte?: number;
  stockGte?: number;
  stockLte?: number;
  stock?: number;
  lowStock?: boolean;
}

export const PRODUCT_SORT_FIELDS = ["name", "price", "stock", "createdAt", "updatedAt"] as const;

const productPredicates: Array<PredicateFactory<ProductCriteria, IProduct>> = [
  ({ nameIcontains }) => (isPresent(nameIcontains) ? { name: containsText(nameIcontains) } : null),
  ({ priceGte }) => (isPresent(priceGte) ? { price: { $gte: priceGte } } : null),
  ({ priceLte }) => (isPresent(priceLte) ? { price: { $lte: priceLte } } : null),
  ({ stockGte }) => (isPresent(stockGte) ? { stock: { $gte: stockGte } } : null),
  ({ stockLte }) => (isPresent(stockLte) ? { stock: { $lte: stockLte } } : null),
  ({ stock }) => (isPresent(stock) ? { stock } : null),
  // lowStock=false imposes nothing; it does not mean "well stocked"
  ({ lowStock }) => (lowStock === true ? { stock: { $lt: LOW_STOCK_THRESHOLD } } : null),
];

export const buildProductFilter = (criteria: ProductCriteria): Predicate<IProduct> =>
  applyFactories(productPredicates, criteria);
