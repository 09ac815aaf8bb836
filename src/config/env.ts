// Runtime settings read from the environment (.env is loaded by the entry points)

export interface AppConfig {
  port: number;
  mongoURI: string;
  dbName: string;
  frontendURL: string;
  cleanupLogFile: string;
  inactiveCustomerDays: number;
}

const readPositiveInt = (raw: string | undefined, fallback: number): number => {
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: readPositiveInt(env.PORT, 5000),
  mongoURI: env.MONGODB_URI || "mongodb://localhost:27017",
  dbName: env.MONGODB_DB_NAME || "crm",
  frontendURL: env.FRONTEND_URL || "http://localhost:5173",
  cleanupLogFile: env.CLEANUP_LOG_FILE || "/tmp/customer_cleanup_log.txt",
  inactiveCustomerDays: readPositiveInt(env.INACTIVE_CUSTOMER_DAYS, 365),
});
