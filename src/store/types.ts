import { ICustomer } from "../models/Customer";
import { IOrder } from "../models/Order";
import { IProduct } from "../models/Product";
import { Predicate } from "../filters/compose";
import { ListOptions } from "../filters/listing";
import {
  CustomerRecord,
  NewCustomer,
  NewOrder,
  NewProduct,
  OrderDetail,
  OrderRecord,
  ProductRecord,
} from "../types/crm";

export interface Page<T> {
  items: T[];
  total: number;
}

export interface CustomerRepository {
  find(filter: Predicate<ICustomer>, options: ListOptions): Promise<Page<CustomerRecord>>;
  findById(id: string): Promise<CustomerRecord | null>;
  existsByEmail(email: string): Promise<boolean>;
  create(data: NewCustomer): Promise<CustomerRecord>;
  idsWithNameContaining(fragment: string): Promise<string[]>;
  idsExcluding(ids: string[]): Promise<string[]>;
  deleteByIds(ids: string[]): Promise<number>;
  deleteAll(): Promise<void>;
}

export interface ProductRepository {
  find(filter: Predicate<IProduct>, options: ListOptions): Promise<Page<ProductRecord>>;
  findById(id: string): Promise<ProductRecord | null>;
  findByIds(ids: string[]): Promise<ProductRecord[]>;
  create(data: NewProduct): Promise<ProductRecord>;
  idsWithNameContaining(fragment: string): Promise<string[]>;
  deleteAll(): Promise<void>;
}

export interface OrderRepository {
  find(filter: Predicate<IOrder>, options: ListOptions): Promise<Page<OrderDetail>>;
  findById(id: string): Promise<OrderDetail | null>;
  create(data: NewOrder): Promise<OrderRecord>;
  setTotal(id: string, totalAmount: string): Promise<OrderDetail | null>;
  customerIdsWithOrdersSince(since: Date): Promise<string[]>;
  deleteByCustomerIds(customerIds: string[]): Promise<number>;
  deleteAll(): Promise<void>;
}

/**
 * Storage seen by the services. `transaction` runs `work` against a store
 * whose operations commit or roll back together.
 */
export interface CrmStore {
  customers: CustomerRepository;
  products: ProductRepository;
  orders: OrderRepository;
  transaction<T>(work: (store: CrmStore) => Promise<T>): Promise<T>;
}
