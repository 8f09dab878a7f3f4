import { AppError } from "../errors";
import { ConnectionHandle } from "../ports/connection";
import { RoomSnapshot } from "../rooms/room";
import { RoomRegistry } from "../rooms/roomRegistry";

export class JoinRoomUseCase {
  constructor(private readonly registry: RoomRegistry) {}

  async execute(connection: ConnectionHandle): Promise<RoomSnapshot> {
    try {
      return await this.attach(connection);
    } catch (error) {
      // The room may have been retired between lookup and attach; a second lookup creates a fresh one.
      if (error instanceof AppError && error.code === "ROOM_UNAVAILABLE") {
        return this.attach(connection);
      }
      throw error;
    }
  }

  private async attach(connection: ConnectionHandle): Promise<RoomSnapshot> {
    const room = await this.registry.getOrCreateRoom(connection.productId);
    return room.attach(connection);
  }
}
