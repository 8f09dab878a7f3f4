import { z } from "zod";
import { ConnectionHandle } from "../ports/connection";
import { BidOutcome } from "../rooms/room";
import { RoomRegistry } from "../rooms/roomRegistry";

export const bidPayloadSchema = z.object({
  amount: z.number().int().positive().max(Number.MAX_SAFE_INTEGER)
});

export type BidPayload = z.infer<typeof bidPayloadSchema>;

export class SubmitBidUseCase {
  constructor(private readonly registry: RoomRegistry) {}

  async execute(connection: ConnectionHandle, payload: unknown): Promise<BidOutcome> {
    const parsed = bidPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return {
        status: "rejected",
        reason: "INVALID_AMOUNT",
        message: parsed.error.issues[0]?.message ?? "Invalid bid payload",
        currentHighest: null
      };
    }

    const room = this.registry.find(connection.productId);
    if (!room) {
      return {
        status: "rejected",
        reason: "ROOM_UNAVAILABLE",
        message: `No live room for ${connection.productId}`,
        currentHighest: null
      };
    }
    return room.submitBid(connection.bidderId, parsed.data.amount, connection);
  }
}
