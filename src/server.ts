import dotenv from "dotenv";
import connectDB from "./config/database";
import { loadConfig } from "./config/env";
import { createApp } from "./app";

dotenv.config();

const config = loadConfig();
const app = createApp(config);

// Start server after the database connection is established
const startServer = async (): Promise<void> => {
  await connectDB(config);

  app.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
  });
};

startServer().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
