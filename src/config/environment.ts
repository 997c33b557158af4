import { config } from "dotenv";

// Load environment variables from .env file
config();

interface EnvironmentConfig {
  mongoUri?: string;
  guardianConfigPath?: string;
  signalReaderUrl?: string;
  broadcastPort: number;
  operatorToken?: string;
  tradeHistoryPath?: string;
  logLevel: string;
}

function validateEnvironment(): EnvironmentConfig {
  const rawPort = process.env.BROADCAST_PORT || "8765";
  const broadcastPort = Number(rawPort);

  if (!Number.isInteger(broadcastPort) || broadcastPort < 1 || broadcastPort > 65535) {
    throw new Error(`BROADCAST_PORT must be an integer in 1-65535, got "${rawPort}"`);
  }

  return {
    mongoUri: process.env.MONGODB_URI || undefined,
    guardianConfigPath: process.env.GUARDIAN_CONFIG || undefined,
    signalReaderUrl: process.env.SIGNAL_READER_URL || undefined,
    broadcastPort,
    operatorToken: process.env.OPERATOR_TOKEN || undefined,
    tradeHistoryPath: process.env.TRADE_HISTORY_PATH || undefined,
    logLevel: process.env.LOG_LEVEL || "info",
  };
}

export const env = validateEnvironment();
