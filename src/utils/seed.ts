import dotenv from "dotenv";
import connectDB, { disconnectDB } from "../config/database";
import { loadConfig } from "../config/env";
import { MongoCrmStore } from "../store/mongoStore";
import { createCustomer } from "../services/customers";
import { createProduct } from "../services/products";
import { createOrder } from "../services/orders";
import { CustomerRecord, ProductRecord } from "../types/crm";

// CRM DATABASE SEED
// Clears customers, products and orders, then creates sample data through
// the same services the API uses, so every record passes validation.

dotenv.config();

const customersData = [
  { name: "Maya Fernandes", email: "maya.fernandes@example.com", phone: "+15550100" },
  { name: "Oskar Lind", email: "oskar.lind@example.com", phone: "555-010-2030" },
  { name: "Priya Raman", email: "priya.raman@example.com" },
  { name: "Tomas Novak", email: "tomas.novak@example.com", phone: "+44 (20) 7946-0011" },
  { name: "Zoe Hartley", email: "zoe.hartley@example.com", phone: "555 0199" },
];

const productsData = [
  { name: "Standing Desk", price: "449.00", stock: 12 },
  { name: "Ergonomic Chair", price: "289.50", stock: 6 },
  { name: "Desk Lamp", price: "39.95", stock: 40 },
  { name: "Monitor Arm", price: "119.99", stock: 9 },
  { name: "Cable Tray", price: "24.00", stock: 75 },
  { name: "Footrest", price: "54.25", stock: 3 },
];

// Indexes into the lists above
const ordersData = [
  { customer: 0, products: [0, 2] },
  { customer: 1, products: [1] },
  { customer: 3, products: [3, 4, 5] },
  { customer: 4, products: [2, 4] },
];

const seedDatabase = async (): Promise<void> => {
  const config = loadConfig();
  await connectDB(config);
  const store = new MongoCrmStore();

  console.log("🗑️  Clearing existing CRM data...");
  await store.orders.deleteAll();
  await store.products.deleteAll();
  await store.customers.deleteAll();
  console.log("✅ Cleared existing CRM data");

  const customers: CustomerRecord[] = [];
  for (const data of customersData) {
    const { customer, errors } = await createCustomer(store, data);
    if (!customer) {
      throw new Error(`Seed customer ${data.email} rejected: ${JSON.stringify(errors)}`);
    }
    customers.push(customer);
  }

  const products: ProductRecord[] = [];
  for (const data of productsData) {
    const { product, errors } = await createProduct(store, data);
    if (!product) {
      throw new Error(`Seed product ${data.name} rejected: ${JSON.stringify(errors)}`);
    }
    products.push(product);
  }

  for (const data of ordersData) {
    const { order, message, errors } = await createOrder(store, {
      customerId: customers[data.customer].id,
      productIds: data.products.map((index) => products[index].id),
    });
    if (!order) {
      throw new Error(`Seed order rejected: ${message} ${JSON.stringify(errors)}`);
    }
  }

  console.log("\n🎉 Seeding completed!");
  console.log(`   Customers: ${customers.length}`);
  console.log(`   Products: ${products.length}`);
  console.log(`   Orders: ${ordersData.length}`);
};

seedDatabase()
  .then(disconnectDB)
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error("❌ Seeding failed:", error);
    process.exit(1);
  });
