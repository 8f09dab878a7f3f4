import { Auction } from "../../domain/entities/auction";
import { Bid } from "../../domain/entities/bid";

export interface AuctionRepository {
  findByProductId(productId: string): Promise<Auction | null>;
  /** Records an administrative close; an auction already closed keeps its first close time. */
  markClosed(productId: string, at: Date): Promise<void>;
}

export interface BidRepository {
  insert(bid: Bid): Promise<void>;
  /** Latest accepted bids for a product, highest sequence first. */
  findLatestByProduct(productId: string, limit: number): Promise<Bid[]>;
}
