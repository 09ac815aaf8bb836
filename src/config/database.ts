import mongoose from "mongoose";
import { AppConfig } from "./env";

// CRM DATABASE
// Single connection owning customers, products and orders.
// Order creation runs inside a transaction, so the server must be a replica set
// (a single-node replica set is enough for local development).

const clientOptions = {
  serverApi: {
    version: mongoose.mongo.ServerApiVersion.v1,
    strict: true,
    deprecationErrors: true,
  },
};

const connectDB = async (config: AppConfig): Promise<void> => {
  try {
    const conn = await mongoose.connect(config.mongoURI, {
      ...clientOptions,
      dbName: config.dbName,
    });

    console.log(`✅ MongoDB Connected Successfully`);
    console.log(`   Host: ${conn.connection.host}`);
    console.log(`   Database: ${conn.connection.name}`);
  } catch (error) {
    console.error("❌ MongoDB connection error:", error);
    console.error("   Please check MONGODB_URI and MONGODB_DB_NAME in your .env file");
    console.error("   Format: mongodb://localhost:27017/?replicaSet=rs0");
    process.exit(1);
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  console.log("👋 MongoDB connection closed");
};

export default connectDB;
