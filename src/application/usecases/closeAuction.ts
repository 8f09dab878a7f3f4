import { auctionNotFound, roomUnavailable } from "../errors";
import { RoomSnapshot } from "../rooms/room";
import { RoomRegistry } from "../rooms/roomRegistry";

export type CloseAuctionResult = {
  closed: boolean;
  snapshot: RoomSnapshot;
};

export class CloseAuctionUseCase {
  constructor(private readonly registry: RoomRegistry) {}

  async execute(productId: string): Promise<CloseAuctionResult> {
    const room = this.registry.find(productId);
    if (!room) {
      throw auctionNotFound(productId);
    }
    const { closed, snapshot } = await room.close("admin");
    if (!snapshot) {
      throw roomUnavailable(productId);
    }
    return { closed, snapshot };
  }
}
