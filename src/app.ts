import express from "express";
import cors from "cors";
import { AppConfig } from "./config/env";
import errorHandler from "./middlewares/errorHandler";

// Routes
import customerRoutes from "./routes/customers";
import productRoutes from "./routes/products";
import orderRoutes from "./routes/orders";

export const createApp = (config: AppConfig): express.Express => {
  const app = express();

  // Middlewares
  app.use(
    cors({
      origin: config.frontendURL,
      credentials: true,
    })
  );
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use("/api/customers", customerRoutes);
  app.use("/api/products", productRoutes);
  app.use("/api/orders", orderRoutes);

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", message: "Server is running" });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
