import { env } from "./config/environment";
import { loadGuardianConfig } from "./config/guardianConfig";
import { connectToDatabase, disconnectFromDatabase } from "./config/mongoose";
import { Orchestrator } from "./engine/Orchestrator";
import { AuditLogger, AuditStore, InMemoryAuditStore, MongoAuditStore } from "./services/AuditLogger";
import { BroadcastServer } from "./services/BroadcastServer";
import { HttpSignalSource } from "./services/SignalSource";
import { logger } from "./utils/logger";

async function main() {
  logger.setLevel(env.logLevel);

  const config = loadGuardianConfig(env.guardianConfigPath);

  let store: AuditStore;
  if (env.mongoUri) {
    await connectToDatabase(env.mongoUri);
    logger.success("MongoDB connected");
    store = new MongoAuditStore();
  } else {
    logger.warning("MONGODB_URI not set: audit events are kept in memory only");
    store = new InMemoryAuditStore();
  }

  const source = env.signalReaderUrl
    ? new HttpSignalSource(env.signalReaderUrl, config.pipeline.readerTimeoutMs)
    : null;

  const orchestrator = new Orchestrator({
    config,
    audit: new AuditLogger(store),
    source,
    historyPath: env.tradeHistoryPath,
  });
  const server = new BroadcastServer(
    orchestrator.broadcaster,
    orchestrator.inboundHandlers(),
    env.broadcastPort,
    env.operatorToken
  );
  if (!env.operatorToken) {
    logger.warning("OPERATOR_TOKEN not set: resume_trading over the socket is disabled");
  }

  await server.start();
  orchestrator.start();

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await orchestrator.shutdown();
    await server.stop();
    await disconnectFromDatabase();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err: unknown) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    });
  });
}

main().catch((err: unknown) => {
  logger.error("Failed to start decision core", err);
  process.exit(1);
});
