import { Auction } from "../../domain/entities/auction";
import { Bid } from "../../domain/entities/bid";
import { AuctionRepository, BidRepository } from "../../application/ports/repositories";
import { getCollections } from "../db/mongo";

export class MongoAuctionRepository implements AuctionRepository {
  async findByProductId(productId: string): Promise<Auction | null> {
    const { auctions } = await getCollections();
    const doc = await auctions.findOne({ productId });
    if (!doc) {
      return null;
    }
    return {
      productId: doc.productId,
      title: doc.title,
      basePrice: doc.basePrice,
      startTime: doc.startTime,
      endTime: doc.endTime,
      closedAt: doc.closedAt ?? null
    } satisfies Auction;
  }

  async markClosed(productId: string, at: Date): Promise<void> {
    const { auctions } = await getCollections();
    // `closedAt: null` also matches documents without the field.
    await auctions.updateOne({ productId, closedAt: null }, { $set: { closedAt: at } });
  }
}

export class MongoBidRepository implements BidRepository {
  // Upsert keyed by (productId, sequence): a retried write-behind job lands once.
  async insert(bid: Bid): Promise<void> {
    const { bids } = await getCollections();
    await bids.updateOne(
      { productId: bid.productId, sequence: bid.sequence },
      {
        $setOnInsert: {
          productId: bid.productId,
          bidderId: bid.bidderId,
          amount: bid.amount,
          timestamp: bid.timestamp,
          sequence: bid.sequence,
          recordedAt: new Date()
        }
      },
      { upsert: true }
    );
  }

  async findLatestByProduct(productId: string, limit: number): Promise<Bid[]> {
    const { bids } = await getCollections();
    const docs = await bids.find({ productId }).sort({ sequence: -1 }).limit(limit).toArray();
    return docs.map(
      (doc) =>
        ({
          productId: doc.productId,
          bidderId: doc.bidderId,
          amount: doc.amount,
          timestamp: doc.timestamp,
          sequence: doc.sequence
        }) satisfies Bid
    );
  }
}
