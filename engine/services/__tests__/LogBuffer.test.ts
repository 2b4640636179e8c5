import { describe, it, expect, beforeEach, vi } from "vitest";
import { LogBuffer } from "../LogBuffer.js";

describe("LogBuffer", () => {
  let buffer: LogBuffer;

  beforeEach(() => {
    buffer = new LogBuffer(3);
  });

  it("assigns sequential ids", () => {
    const first = buffer.push({ timestamp: 1, level: "info", message: "one" });
    const second = buffer.push({ timestamp: 2, level: "info", message: "two" });

    expect(first.id).toBe("log-1");
    expect(second.id).toBe("log-2");
    expect(buffer.size()).toBe(2);
  });

  it("drops the oldest entries past capacity", () => {
    for (const message of ["a", "b", "c", "d"]) {
      buffer.push({ timestamp: 0, level: "debug", message });
    }

    expect(buffer.getAll().map((entry) => entry.message)).toEqual(["b", "c", "d"]);
  });

  it("filters by level, source and text", () => {
    buffer.push({ timestamp: 0, level: "info", message: "Tabset loaded 'work'.", source: "TabsetService" });
    buffer.push({ timestamp: 0, level: "error", message: "Unable to save", source: "TabsetStore" });
    buffer.push({ timestamp: 0, level: "warn", message: "notify-send failed", source: "DesktopNotifier" });

    expect(buffer.getFiltered({ levels: ["error", "warn"] }).map((entry) => entry.message)).toEqual([
      "Unable to save",
      "notify-send failed",
    ]);
    expect(buffer.getFiltered({ source: "TabsetStore" })).toHaveLength(1);
    expect(buffer.getFiltered({ search: "TABSET LOADED" })[0].message).toBe("Tabset loaded 'work'.");
  });

  it("notifies listeners until they unsubscribe", () => {
    const listener = vi.fn();
    const unsubscribe = buffer.onEntry(listener);

    const entry = buffer.push({ timestamp: 0, level: "info", message: "first" });
    unsubscribe();
    buffer.push({ timestamp: 0, level: "info", message: "second" });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(entry);
  });

  it("clears entries", () => {
    buffer.push({ timestamp: 0, level: "info", message: "x" });
    buffer.clear();
    expect(buffer.getAll()).toEqual([]);
  });
});
