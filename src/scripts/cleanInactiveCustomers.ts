import { appendFile } from "fs/promises";
import dotenv from "dotenv";
import connectDB, { disconnectDB } from "../config/database";
import { loadConfig } from "../config/env";
import { MongoCrmStore } from "../store/mongoStore";
import { cleanInactiveCustomers, cleanupLogLine } from "../services/maintenance";

// Meant for cron, e.g. weekly:
//   0 2 * * 0  cd /srv/crm && npm run cleanup:customers

dotenv.config();

const run = async (): Promise<void> => {
  const config = loadConfig();
  await connectDB(config);

  const deleted = await cleanInactiveCustomers(new MongoCrmStore(), {
    inactiveDays: config.inactiveCustomerDays,
  });

  const line = cleanupLogLine(deleted, new Date());
  await appendFile(config.cleanupLogFile, `${line}\n`);
  console.log(`✅ ${line} (logged to ${config.cleanupLogFile})`);
};

run()
  .then(disconnectDB)
  .catch(async (error: unknown) => {
    console.error("❌ Inactive customer cleanup failed:", error);
    await disconnectDB();
    process.exitCode = 1;
  });
