import { AuctionStatus } from "../entities/auction";
import { Bid } from "../entities/bid";

export type BidRejectionReason =
  | "INVALID_AMOUNT"
  | "AUCTION_NOT_OPEN"
  | "AMOUNT_TOO_LOW"
  | "UNAUTHORIZED"
  | "ROOM_UNAVAILABLE";

export type BidCheckInput = {
  status: AuctionStatus;
  basePrice: number;
  highestBid: Bid | null;
  bidderId: string | null;
  attached: boolean;
  amount: number;
};

export type BidRejection = {
  reason: BidRejectionReason;
  message: string;
};

export type BidCheckResult = ({ accepted: false } & BidRejection) | { accepted: true; bidderId: string };

const reject = (reason: BidRejectionReason, message: string): BidCheckResult => ({
  accepted: false,
  reason,
  message
});

export function minimumAcceptable(basePrice: number, highestBid: Bid | null): number {
  return highestBid ? highestBid.amount + 1 : basePrice;
}

/**
 * Validates a submission against the room state, in a fixed order:
 * amount shape, room status, amount versus the current highest, bidder identity.
 * An accepted result carries the bidder identity the bid may be sequenced under.
 */
export function checkBid(input: BidCheckInput): BidCheckResult {
  if (!Number.isSafeInteger(input.amount) || input.amount <= 0) {
    return reject("INVALID_AMOUNT", "Bid amount must be a positive integer");
  }
  if (input.status !== "open") {
    return reject("AUCTION_NOT_OPEN", `Auction is ${input.status}`);
  }
  if (input.highestBid) {
    if (input.amount <= input.highestBid.amount) {
      return reject("AMOUNT_TOO_LOW", `Bid must be greater than ${input.highestBid.amount}`);
    }
  } else if (input.amount < input.basePrice) {
    return reject("AMOUNT_TOO_LOW", `Bid must be at least ${input.basePrice}`);
  }
  if (!input.bidderId || !input.attached) {
    return reject("UNAUTHORIZED", "Bidder is not authenticated in this room");
  }
  return { accepted: true, bidderId: input.bidderId };
}
