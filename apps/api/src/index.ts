import dotenv from "dotenv";
import { HttpSigningKeySource } from "./auth/signing-keys.js";
import { loadConfig } from "./config/env.js";
import { openDatabase } from "./db/client.js";
import { logger } from "./lib/logger.js";
import { getStorageConfig, S3PhotoStorage } from "./lib/storage.js";
import { logNotifications, NotificationBus } from "./notifications/notification-bus.js";
import { createApp } from "./server/app.js";
import { createServices } from "./server/services.js";

dotenv.config();

const config = loadConfig();
logger.level = config.logLevel;
const { db } = openDatabase(config.databasePath);
const notifications = new NotificationBus();

logNotifications(notifications);

const services = createServices({
  db,
  webUrl: config.webUrl,
  adminEmails: config.adminEmails,
  identity: {
    keys: new HttpSigningKeySource({
      url: config.identity.keysUrl,
      timeoutMs: config.identity.keyFetchTimeoutMs,
      attempts: config.identity.keyFetchAttempts,
      backoffMs: config.identity.keyFetchBackoffMs
    }),
    audience: config.identity.projectId,
    issuer: config.identity.issuer
  },
  storage: new S3PhotoStorage(getStorageConfig()),
  notifications
});

const app = createApp(services);

if (process.env.NODE_ENV !== "test") {
  app.listen(config.port, () => {
    logger.info({ port: config.port, admins: config.adminEmails.length }, "Eventfolio API listening");
  });
}

export default app;
