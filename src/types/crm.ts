// Plain records the services and controllers work with.
// Decimals travel as strings with two fraction digits ("1025.49").

export interface CustomerRecord {
  id: string;
  name: string;
  email: string;
  phone: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProductRecord {
  id: string;
  name: string;
  price: string;
  stock: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderRecord {
  id: string;
  customerId: string;
  productIds: string[];
  totalAmount: string;
  orderDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

/** An order with its customer and products resolved. `customer` is null once the customer is gone. */
export interface OrderDetail extends OrderRecord {
  customer: CustomerRecord | null;
  products: ProductRecord[];
}

export interface NewCustomer {
  name: string;
  email: string;
  phone?: string;
}

export interface NewProduct {
  name: string;
  price: string;
  stock: number;
}

export interface NewOrder {
  customerId: string;
  productIds: string[];
  orderDate: Date;
}

export interface FieldError {
  field: string;
  message: string;
}

export interface RowErrors {
  index: number;
  errors: FieldError[];
}

export interface Pagination {
  page: number;
  limit: number;
  total: number;
  pages: number;
}

export interface ListResult<T> {
  items: T[];
  pagination: Pagination;
}

export interface CustomerPayload {
  customer: CustomerRecord | null;
  message: string;
  errors: FieldError[];
}

export interface BulkCustomersPayload {
  customers: CustomerRecord[];
  message: string;
  errors: RowErrors[];
}

export interface ProductPayload {
  product: ProductRecord | null;
  message: string;
  errors: FieldError[];
}

export interface OrderPayload {
  order: OrderDetail | null;
  message: string;
  errors: FieldError[];
}
