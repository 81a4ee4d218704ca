/**
 * slotlist - Event Emitter Tests
 * Ordered delivery, unsubscription and handler error isolation
 */

import { describe, it, expect, vi } from "vitest";
import { createEmitter } from "../../src/events";
import { createTestLogger } from "../fixtures";

interface TestEvents {
  added: { element: string; index: number };
  removed: { element: string; index: number };
  [key: string]: unknown;
}

describe("on / emit", () => {
  it("should call handler when event is emitted", () => {
    const emitter = createEmitter<TestEvents>();
    const handler = vi.fn();

    emitter.on("added", handler);
    emitter.emit("added", { element: "row", index: 2 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ element: "row", index: 2 });
  });

  it("should call handlers in subscription order", () => {
    const emitter = createEmitter<TestEvents>();
    const calls: string[] = [];

    emitter.on("added", () => calls.push("first"));
    emitter.on("added", () => calls.push("second"));
    emitter.on("added", () => calls.push("third"));
    emitter.emit("added", { element: "row", index: 0 });

    expect(calls).toEqual(["first", "second", "third"]);
  });

  it("should not call handlers for different events", () => {
    const emitter = createEmitter<TestEvents>();
    const addedHandler = vi.fn();
    const removedHandler = vi.fn();

    emitter.on("added", addedHandler);
    emitter.on("removed", removedHandler);
    emitter.emit("added", { element: "row", index: 0 });

    expect(addedHandler).toHaveBeenCalledTimes(1);
    expect(removedHandler).not.toHaveBeenCalled();
  });

  it("should handle events with no listeners", () => {
    const emitter = createEmitter<TestEvents>();

    expect(() => emitter.emit("added", { element: "row", index: 0 })).not.toThrow();
  });
});

describe("off / unsubscribe", () => {
  it("should only remove the specified handler", () => {
    const emitter = createEmitter<TestEvents>();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    emitter.on("added", handler1);
    emitter.on("added", handler2);
    emitter.off("added", handler1);
    emitter.emit("added", { element: "row", index: 0 });

    expect(handler1).not.toHaveBeenCalled();
    expect(handler2).toHaveBeenCalledTimes(1);
  });

  it("should unsubscribe when the returned function is called", () => {
    const emitter = createEmitter<TestEvents>();
    const handler = vi.fn();

    const unsubscribe = emitter.on("added", handler);
    emitter.emit("added", { element: "a", index: 0 });
    unsubscribe();
    emitter.emit("added", { element: "b", index: 1 });

    expect(handler).toHaveBeenCalledTimes(1);
  });
});

describe("once", () => {
  it("should call handler only once", () => {
    const emitter = createEmitter<TestEvents>();
    const handler = vi.fn();

    emitter.once("removed", handler);
    emitter.emit("removed", { element: "a", index: 0 });
    emitter.emit("removed", { element: "b", index: 1 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ element: "a", index: 0 });
  });

  it("should not skip the next handler when a once handler removes itself", () => {
    const emitter = createEmitter<TestEvents>();
    const after = vi.fn();

    emitter.once("removed", () => {});
    emitter.on("removed", after);
    emitter.emit("removed", { element: "a", index: 0 });
    emitter.emit("removed", { element: "b", index: 1 });

    expect(after).toHaveBeenCalledTimes(2);
  });
});

describe("error handling", () => {
  it("should keep calling handlers after one throws and report to the logger", () => {
    const logger = createTestLogger();
    const emitter = createEmitter<TestEvents>(logger);
    const failure = new Error("handler failed");
    const successHandler = vi.fn();

    emitter.on("added", () => {
      throw failure;
    });
    emitter.on("added", successHandler);

    expect(() => emitter.emit("added", { element: "row", index: 0 })).not.toThrow();
    expect(successHandler).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      '[slotlist] Error in event handler for "added":',
      failure,
    );
  });
});
