import { Bid } from "../domain/entities/bid";
import { RoomEvent } from "../domain/entities/roomEvent";
import { BidOutcome, RoomSnapshot } from "../application/rooms/room";

export type SerializedBid = {
  productId: string;
  bidder: string;
  amount: number;
  timestamp: string;
  sequence: number;
};

export function serializeBid(bid: Bid): SerializedBid {
  return {
    productId: bid.productId,
    bidder: bid.bidderId,
    amount: bid.amount,
    timestamp: bid.timestamp.toISOString(),
    sequence: bid.sequence
  };
}

export function serializeSnapshot(snapshot: RoomSnapshot) {
  return {
    ...snapshot,
    startTime: snapshot.startTime.toISOString(),
    endTime: snapshot.endTime.toISOString(),
    highestBid: snapshot.highestBid ? serializeBid(snapshot.highestBid) : null,
    recentBids: snapshot.recentBids.map(serializeBid)
  };
}

export function serializeEvent(event: RoomEvent) {
  switch (event.type) {
    case "bid:accepted":
      return { ...event, bid: serializeBid(event.bid) };
    case "auction:opened":
      return { ...event, at: event.at.toISOString() };
    case "auction:closed":
      return {
        ...event,
        at: event.at.toISOString(),
        winningBid: event.winningBid ? serializeBid(event.winningBid) : null
      };
  }
}

export function serializeOutcome(outcome: BidOutcome) {
  if (outcome.status === "accepted") {
    return { status: outcome.status, bid: serializeBid(outcome.bid) };
  }
  return outcome;
}
