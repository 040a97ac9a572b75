import { Db, MongoClient } from "mongodb";
import { config } from "../config/environment";
import { logger } from "../utils/logger";

// Log the connection details (with sensitive info masked)
const maskedUri = config.mongoUri.replace(/\/\/([^:]+):([^@]+)@/, '//***:***@');

let client: MongoClient | null = null;
let db: Db | null = null;

async function connect(): Promise<Db> {
  if (!db) {
    logger.info(`MongoDB connecting to: ${maskedUri}`, { database: config.mongoDbName });
    // Writes are acknowledged by a majority before a call returns
    const candidate = new MongoClient(config.mongoUri, {
      retryWrites: true,
      w: "majority"
    });

    try {
      await candidate.connect();
      const database = candidate.db(config.mongoDbName);

      // Ping the database to verify connection
      await database.command({ ping: 1 });
      client = candidate;
      db = database;
      logger.info("MongoDB connection verified successfully", { database: config.mongoDbName });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Failed to connect to MongoDB", {
        uri: maskedUri,
        dbName: config.mongoDbName,
        uriExists: !!process.env.MONGO_URI,
        message
      });
      await candidate.close();
      throw new Error(`MongoDB connection failed: ${message}`);
    }
  }
  return db;
}

export async function getDb(): Promise<Db> {
  return await connect();
}

export async function pingDb(): Promise<boolean> {
  if (!db) {
    return false;
  }
  try {
    await db.command({ ping: 1 });
    return true;
  } catch (error) {
    logger.warn("MongoDB ping failed", { message: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

// Close the MongoDB connection (for graceful shutdown)
export async function closeConnection(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
    logger.info("MongoDB connection closed");
  }
}
