import { CancelTimer, RoomTimer } from "../../application/ports/services";

// setTimeout overflows past 2^31 - 1 ms (about 24.8 days) and fires immediately.
const MAX_TIMEOUT_MS = 2_147_483_647;

export class NodeRoomTimer implements RoomTimer {
  schedule(runAt: Date, handler: () => void): CancelTimer {
    let timer: NodeJS.Timeout | null = null;
    let cancelled = false;

    const arm = () => {
      const remaining = runAt.getTime() - Date.now();
      if (remaining > MAX_TIMEOUT_MS) {
        timer = setTimeout(arm, MAX_TIMEOUT_MS);
        return;
      }
      timer = setTimeout(() => {
        timer = null;
        if (!cancelled) {
          handler();
        }
      }, Math.max(0, remaining));
    };
    arm();

    return () => {
      cancelled = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };
  }
}
