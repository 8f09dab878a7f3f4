import { describe, it, expect } from "vitest";
import { hasValidWindow, statusAt } from "../../src/domain/services/auctionSchedule";

const window = {
  startTime: new Date("2030-01-01T10:00:00Z"),
  endTime: new Date("2030-01-01T11:00:00Z")
};

describe("auctionSchedule", () => {
  describe("statusAt", () => {
    it("is pending before the start", () => {
      expect(statusAt(window, new Date("2030-01-01T09:59:59Z"))).toBe("pending");
    });

    it("is open from the start instant", () => {
      expect(statusAt(window, new Date("2030-01-01T10:00:00Z"))).toBe("open");
    });

    it("is open just before the end", () => {
      expect(statusAt(window, new Date("2030-01-01T10:59:59.999Z"))).toBe("open");
    });

    it("is closed from the end instant", () => {
      expect(statusAt(window, new Date("2030-01-01T11:00:00Z"))).toBe("closed");
    });

    it("stays closed inside the window once an administrator closed it", () => {
      const closed = { ...window, closedAt: new Date("2030-01-01T10:15:00Z") };

      expect(statusAt(closed, new Date("2030-01-01T10:30:00Z"))).toBe("closed");
      expect(statusAt({ ...window, closedAt: null }, new Date("2030-01-01T10:30:00Z"))).toBe("open");
    });
  });

  describe("hasValidWindow", () => {
    it("requires the start to precede the end", () => {
      expect(hasValidWindow(window)).toBe(true);
      expect(hasValidWindow({ startTime: window.endTime, endTime: window.endTime })).toBe(false);
      expect(hasValidWindow({ startTime: window.endTime, endTime: window.startTime })).toBe(false);
    });
  });
});
