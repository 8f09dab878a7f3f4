import { ConnectionHandle } from "../ports/connection";
import { RoomRegistry } from "../rooms/roomRegistry";

export class LeaveRoomUseCase {
  constructor(private readonly registry: RoomRegistry) {}

  async execute(connection: ConnectionHandle): Promise<boolean> {
    const room = this.registry.find(connection.productId);
    if (!room) {
      return false;
    }
    return room.detach(connection, "client");
  }
}
