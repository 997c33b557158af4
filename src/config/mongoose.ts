import mongoose from "mongoose";
import { logger } from "../utils/logger";

export async function connectToDatabase(uri: string): Promise<void> {
  mongoose.connection.on("error", (err) => {
    logger.error("MongoDB connection error:", err);
  });
  mongoose.connection.on("disconnected", () => {
    logger.warning("MongoDB disconnected");
  });

  await mongoose.connect(uri, { serverSelectionTimeoutMS: 10_000 });
}

export async function disconnectFromDatabase(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}
