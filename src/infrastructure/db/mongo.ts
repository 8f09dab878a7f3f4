import { MongoClient, Db, Collection } from "mongodb";
import { env } from "../../config/env";

let client: MongoClient | null = null;
let db: Db | null = null;

export type AuctionDocument = {
  productId: string;
  title: string;
  basePrice: number;
  startTime: Date;
  endTime: Date;
  closedAt?: Date | null;
};

export type BidDocument = {
  productId: string;
  bidderId: string;
  amount: number;
  timestamp: Date;
  sequence: number;
  recordedAt: Date;
};

export async function connectMongo(): Promise<Db> {
  if (db) {
    return db;
  }
  client = new MongoClient(env.MONGO_URI);
  await client.connect();
  db = client.db();
  return db;
}

export async function disconnectMongo(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  db = null;
}

export type Collections = {
  auctions: Collection<AuctionDocument>;
  bids: Collection<BidDocument>;
};

export async function getCollections(): Promise<Collections> {
  const database = await connectMongo();
  return {
    auctions: database.collection<AuctionDocument>("auctions"),
    bids: database.collection<BidDocument>("bids")
  };
}

export async function ensureIndexes(): Promise<void> {
  const { auctions, bids } = await getCollections();
  await auctions.createIndex({ productId: 1 }, { unique: true });
  await bids.createIndex({ productId: 1, sequence: -1 }, { unique: true });
  await bids.createIndex({ bidderId: 1 });
}
