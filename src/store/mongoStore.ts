import mongoose, { ClientSession, Types } from "mongoose";
import Customer, { CustomerDocument, ICustomer } from "../models/Customer";
import Product, { IProduct, ProductDocument } from "../models/Product";
import Order, { IOrder, OrderDocument } from "../models/Order";
import { Predicate, containsText } from "../filters/compose";
import { ListOptions } from "../filters/listing";
import { normalizeDecimal } from "../utils/money";
import { isObjectIdString } from "../utils/text";
import {
  CustomerRecord,
  NewCustomer,
  NewOrder,
  NewProduct,
  OrderDetail,
  OrderRecord,
  ProductRecord,
} from "../types/crm";
import {
  CrmStore,
  CustomerRepository,
  OrderRepository,
  Page,
  ProductRepository,
} from "./types";

const toCustomerRecord = (doc: CustomerDocument): CustomerRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  email: doc.email,
  phone: doc.phone || null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toProductRecord = (doc: ProductDocument): ProductRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  price: normalizeDecimal(doc.price.toString()),
  stock: doc.stock,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toOrderRecord = (doc: OrderDocument): OrderRecord => ({
  id: doc._id.toString(),
  customerId: doc.customer.toString(),
  productIds: doc.products.map((id) => id.toString()),
  totalAmount: normalizeDecimal(doc.totalAmount.toString()),
  orderDate: doc.orderDate,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

// Ids that cannot be ObjectIds would make Mongoose throw a CastError
const castableIds = (ids: string[]): string[] => ids.filter(isObjectIdString);

const unique = (values: string[]): string[] => [...new Set(values)];

class MongoCustomerRepository implements CustomerRepository {
  constructor(private readonly session: ClientSession | null) {}

  async find(filter: Predicate<ICustomer>, options: ListOptions): Promise<Page<CustomerRecord>> {
    const [docs, total] = await Promise.all([
      Customer.find(filter)
        .sort(options.sort)
        .skip(options.skip)
        .limit(options.limit)
        .session(this.session),
      Customer.countDocuments(filter).session(this.session),
    ]);
    return { items: docs.map(toCustomerRecord), total };
  }

  async findById(id: string): Promise<CustomerRecord | null> {
    if (!isObjectIdString(id)) {
      return null;
    }
    const doc = await Customer.findById(id).session(this.session);
    return doc ? toCustomerRecord(doc) : null;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const found = await Customer.exists({ email: email.trim().toLowerCase() }).session(
      this.session
    );
    return found !== null;
  }

  async create(data: NewCustomer): Promise<CustomerRecord> {
    const doc = await new Customer(data).save({ session: this.session ?? undefined });
    return toCustomerRecord(doc);
  }

  async idsWithNameContaining(fragment: string): Promise<string[]> {
    const docs = await Customer.find({ name: containsText(fragment) })
      .select("_id")
      .session(this.session);
    return docs.map((doc) => doc._id.toString());
  }

  async idsExcluding(ids: string[]): Promise<string[]> {
    const docs = await Customer.find({ _id: { $nin: castableIds(ids) } })
      .select("_id")
      .session(this.session);
    return docs.map((doc) => doc._id.toString());
  }

  async deleteByIds(ids: string[]): Promise<number> {
    const result = await Customer.deleteMany(
      { _id: { $in: castableIds(ids) } },
      { session: this.session ?? undefined }
    );
    return result.deletedCount;
  }

  async deleteAll(): Promise<void> {
    await Customer.deleteMany({}, { session: this.session ?? undefined });
  }
}

class MongoProductRepository implements ProductRepository {
  constructor(private readonly session: ClientSession | null) {}

  async find(filter: Predicate<IProduct>, options: ListOptions): Promise<Page<ProductRecord>> {
    const [docs, total] = await Promise.all([
      Product.find(filter)
        .sort(options.sort)
        .skip(options.skip)
        .limit(options.limit)
        .session(this.session),
      Product.countDocuments(filter).session(this.session),
    ]);
    return { items: docs.map(toProductRecord), total };
  }

  async findById(id: string): Promise<ProductRecord | null> {
    if (!isObjectIdString(id)) {
      return null;
    }
    const doc = await Product.findById(id).session(this.session);
    return doc ? toProductRecord(doc) : null;
  }

  async findByIds(ids: string[]): Promise<ProductRecord[]> {
    const docs = await Product.find({ _id: { $in: castableIds(ids) } }).session(this.session);
    return docs.map(toProductRecord);
  }

  async create(data: NewProduct): Promise<ProductRecord> {
    const doc = await new Product({
      name: data.name,
      price: Types.Decimal128.fromString(data.price),
      stock: data.stock,
    }).save({ session: this.session ?? undefined });
    return toProductRecord(doc);
  }

  async idsWithNameContaining(fragment: string): Promise<string[]> {
    const docs = await Product.find({ name: containsText(fragment) })
      .select("_id")
      .session(this.session);
    return docs.map((doc) => doc._id.toString());
  }

  async deleteAll(): Promise<void> {
    await Product.deleteMany({}, { session: this.session ?? undefined });
  }
}

class MongoOrderRepository implements OrderRepository {
  constructor(private readonly session: ClientSession | null) {}

  // Customers and products are fetched in two queries and attached by id,
  // instead of one populate() per order
  private async attachRelations(docs: OrderDocument[]): Promise<OrderDetail[]> {
    if (docs.length === 0) {
      return [];
    }

    const customerIds = unique(docs.map((doc) => doc.customer.toString()));
    const productIds = unique(docs.flatMap((doc) => doc.products.map((id) => id.toString())));

    const [customers, products] = await Promise.all([
      Customer.find({ _id: { $in: customerIds } }).session(this.session),
      Product.find({ _id: { $in: productIds } }).session(this.session),
    ]);

    const customerMap = new Map(customers.map((doc) => [doc._id.toString(), toCustomerRecord(doc)]));
    const productMap = new Map(products.map((doc) => [doc._id.toString(), toProductRecord(doc)]));

    return docs.map((doc) => {
      const record = toOrderRecord(doc);
      return {
        ...record,
        customer: customerMap.get(record.customerId) ?? null,
        products: record.productIds.flatMap((id) => {
          const product = productMap.get(id);
          return product ? [product] : [];
        }),
      };
    });
  }

  async find(filter: Predicate<IOrder>, options: ListOptions): Promise<Page<OrderDetail>> {
    const [docs, total] = await Promise.all([
      Order.find(filter)
        .sort(options.sort)
        .skip(options.skip)
        .limit(options.limit)
        .session(this.session),
      Order.countDocuments(filter).session(this.session),
    ]);
    return { items: await this.attachRelations(docs), total };
  }

  async findById(id: string): Promise<OrderDetail | null> {
    if (!isObjectIdString(id)) {
      return null;
    }
    const doc = await Order.findById(id).session(this.session);
    if (!doc) {
      return null;
    }
    const [detail] = await this.attachRelations([doc]);
    return detail ?? null;
  }

  async create(data: NewOrder): Promise<OrderRecord> {
    const doc = await new Order({
      customer: new Types.ObjectId(data.customerId),
      products: data.productIds.map((id) => new Types.ObjectId(id)),
      orderDate: data.orderDate,
    }).save({ session: this.session ?? undefined });
    return toOrderRecord(doc);
  }

  async setTotal(id: string, totalAmount: string): Promise<OrderDetail | null> {
    if (!isObjectIdString(id)) {
      return null;
    }
    const doc = await Order.findByIdAndUpdate(
      id,
      { totalAmount: Types.Decimal128.fromString(totalAmount) },
      { new: true, session: this.session ?? undefined }
    );
    if (!doc) {
      return null;
    }
    const [detail] = await this.attachRelations([doc]);
    return detail ?? null;
  }

  async customerIdsWithOrdersSince(since: Date): Promise<string[]> {
    const ids = await Order.distinct("customer", { createdAt: { $gte: since } }).session(
      this.session
    );
    return ids.map((id) => String(id));
  }

  async deleteByCustomerIds(customerIds: string[]): Promise<number> {
    const result = await Order.deleteMany(
      { customer: { $in: castableIds(customerIds) } },
      { session: this.session ?? undefined }
    );
    return result.deletedCount;
  }

  async deleteAll(): Promise<void> {
    await Order.deleteMany({}, { session: this.session ?? undefined });
  }
}

export class MongoCrmStore implements CrmStore {
  readonly customers: CustomerRepository;
  readonly products: ProductRepository;
  readonly orders: OrderRepository;

  constructor(private readonly session: ClientSession | null = null) {
    this.customers = new MongoCustomerRepository(session);
    this.products = new MongoProductRepository(session);
    this.orders = new MongoOrderRepository(session);
  }

  async transaction<T>(work: (store: CrmStore) => Promise<T>): Promise<T> {
    // Already inside a transaction: join it
    if (this.session) {
      return work(this);
    }
    return mongoose.connection.transaction((session) => work(new MongoCrmStore(session)));
  }
}
