import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, renderBox, stripAnsi } from "../logger.js";
import { isNonEmptyString, isRecord, KeyedLock } from "../utils.js";

describe("KeyedLock", () => {
  it("runs same-key operations in arrival order", async () => {
    const lock = new KeyedLock();
    const order: number[] = [];
    const slow = lock.withLock("device:0", async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(1);
    });
    const fast = lock.withLock("device:0", async () => {
      order.push(2);
    });
    await Promise.all([slow, fast]);
    expect(order).toEqual([1, 2]);
    expect(lock.isLocked("device:0")).toBe(false);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const slow = lock.withLock("device:0", async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push("device:0");
    });
    const other = lock.withLock("device:1", async () => {
      order.push("device:1");
    });
    await Promise.all([slow, other]);
    expect(order).toEqual(["device:1", "device:0"]);
  });

  it("releases the lock when the operation throws", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.withLock("host", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.withLock("host", async () => "next")).resolves.toBe("next");
  });
});

describe("type guards", () => {
  it("recognises plain objects only", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });

  it("rejects blank strings", () => {
    expect(isNonEmptyString("  ")).toBe(false);
    expect(isNonEmptyString("a")).toBe(true);
    expect(isNonEmptyString(1)).toBe(false);
  });
});

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the minimum level", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = new Logger("warn");
    logger.info("ignored");
    logger.warn("device offline", { device_index: 2 });
    expect(write).toHaveBeenCalledTimes(1);
    const line = stripAnsi(String(write.mock.calls[0][0]));
    expect(line).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} \[WARN \] device offline \{"device_index":2\}\n$/);
  });

  it("renders a box sized to its widest line", () => {
    expect(stripAnsi(renderBox("T", ["ab"]))).toBe("╔ T ═╗\n║ ab ║\n╚════╝");
  });
});
