/**
 * slotlist - Config and Error Tests
 */

import { describe, it, expect } from "vitest";
import { resolveBaseConfig, resolveDisplayListConfig } from "../src/config";
import {
  DisplayListError,
  bindFailure,
  indexOutOfRange,
  isDisplayListError,
} from "../src/errors";
import { createMemoryHost } from "../src/hosts/memory";
import { createTestLogger, entryPrefab, type EntryView } from "./fixtures";

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
};

describe("resolveBaseConfig", () => {
  it("should fill in defaults", () => {
    const resolved = resolveBaseConfig({ host: createMemoryHost<EntryView>() });

    expect(resolved.logger).toBe(console);
    expect(resolved.debug).toBe(false);
    expect(resolved.resetTransform).toBe(true);
    expect(resolved.size).toBeUndefined();
  });

  it("should keep a custom logger and debug flag", () => {
    const logger = createTestLogger();

    const resolved = resolveBaseConfig({
      host: createMemoryHost<EntryView>(),
      logger,
      debug: true,
    });

    expect(resolved.logger).toBe(logger);
    expect(resolved.debug).toBe(true);
  });

  it("should reject a missing host", () => {
    const error = catchError(() => Reflect.apply(resolveBaseConfig, undefined, [{}]));

    expect(isDisplayListError(error, "INVALID_ARGUMENT")).toBe(true);
    if (!(error instanceof DisplayListError)) return;
    expect(error.message).toBe("[slotlist] host is required");
  });

  it("should reject a host missing a primitive", () => {
    const host = { ...createMemoryHost<EntryView>(), setSiblingOrder: undefined };

    const error = catchError(() => Reflect.apply(resolveBaseConfig, undefined, [{ host }]));

    expect(isDisplayListError(error, "INVALID_ARGUMENT")).toBe(true);
    if (!(error instanceof DisplayListError)) return;
    expect(error.message).toBe("[slotlist] host.setSiblingOrder must be a function");
  });
});

describe("resolveDisplayListConfig", () => {
  it("should carry the prefab settings", () => {
    const resolved = resolveDisplayListConfig({
      host: createMemoryHost<EntryView>(),
      prefab: entryPrefab(),
      resetTransform: false,
      size: { width: 10, height: 2 },
    });

    expect(resolved.resetTransform).toBe(false);
    expect(resolved.size).toEqual({ width: 10, height: 2 });
  });

  it("should reject a size that is not finite", () => {
    const error = catchError(() =>
      resolveDisplayListConfig({
        host: createMemoryHost<EntryView>(),
        prefab: entryPrefab(),
        size: { width: Number.NaN, height: 2 },
      }),
    );

    expect(isDisplayListError(error, "INVALID_ARGUMENT")).toBe(true);
  });
});

describe("errors", () => {
  it("should prefix messages and expose the index", () => {
    const error = indexOutOfRange(7, 0, 3);

    expect(error.name).toBe("DisplayListError");
    expect(error.code).toBe("INDEX_OUT_OF_RANGE");
    expect(error.index).toBe(7);
    expect(error.message).toBe("[slotlist] Index 7 is outside [0, 3]");
  });

  it("should keep the original bind error as its cause", () => {
    const cause = new Error("no label");

    const error = bindFailure(2, cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe("[slotlist] Failed to bind record 2: no label");
    expect(bindFailure(0, "plain").message).toBe(
      "[slotlist] Failed to bind record 0: plain",
    );
  });

  it("should match codes only when asked", () => {
    const error = indexOutOfRange(1, 0, 0);

    expect(isDisplayListError(error)).toBe(true);
    expect(isDisplayListError(error, "INVALID_STATE")).toBe(false);
    expect(isDisplayListError(new Error("x"))).toBe(false);
  });
});
