import { vi } from "vitest";
import { Auction } from "../../src/domain/entities/auction";
import { Bid } from "../../src/domain/entities/bid";
import { AuctionRepository, BidRepository } from "../../src/application/ports/repositories";

// In-memory storage for mocks
export function createMockStorage() {
  const bids: Bid[] = [];
  return {
    auctions: new Map<string, Auction>(),
    bids
  };
}

export type MockStorage = ReturnType<typeof createMockStorage>;

export function createMockAuctionRepository(storage: MockStorage) {
  return {
    findByProductId: vi.fn(async (productId: string) => storage.auctions.get(productId) ?? null),
    markClosed: vi.fn(async (productId: string, at: Date) => {
      const auction = storage.auctions.get(productId);
      if (auction && !auction.closedAt) {
        storage.auctions.set(productId, { ...auction, closedAt: at });
      }
    })
  } satisfies AuctionRepository;
}

export function createMockBidRepository(storage: MockStorage) {
  return {
    insert: vi.fn(async (bid: Bid) => {
      storage.bids.push(bid);
    }),
    findLatestByProduct: vi.fn(async (productId: string, limit: number) =>
      storage.bids
        .filter((bid) => bid.productId === productId)
        .sort((a, b) => b.sequence - a.sequence)
        .slice(0, limit)
    )
  } satisfies BidRepository;
}

export function seedAuction(storage: MockStorage, overrides: Partial<Auction> = {}): Auction {
  const now = Date.now();
  const auction: Auction = {
    productId: `product-${storage.auctions.size + 1}`,
    title: "Test lot",
    basePrice: 100,
    startTime: new Date(now - 60_000),
    endTime: new Date(now + 10 * 60_000),
    ...overrides
  };
  storage.auctions.set(auction.productId, auction);
  return auction;
}

export function seedBid(storage: MockStorage, productId: string, overrides: Partial<Bid> = {}): Bid {
  const bid: Bid = {
    productId,
    bidderId: "bidder-seed",
    amount: 100,
    timestamp: new Date(),
    sequence: storage.bids.filter((existing) => existing.productId === productId).length + 1,
    ...overrides
  };
  storage.bids.push(bid);
  return bid;
}
