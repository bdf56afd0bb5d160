import { MongoClient } from "mongodb";

export const MONGO_APP_NAME = "etl-module-kernel";

export const createMongoClient = async (mongoUri: string, appName = MONGO_APP_NAME): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { appName });
  await client.connect();
  return client;
};
