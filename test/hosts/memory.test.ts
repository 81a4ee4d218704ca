/**
 * slotlist - Memory Host Tests
 */

import { describe, it, expect } from "vitest";
import { createMemoryHost, identityTransform } from "../../src/hosts/memory";
import { isDisplayListError } from "../../src/errors";
import { entryPrefab, type EntryView } from "../fixtures";

describe("createMemoryHost", () => {
  it("should name clones after their prefab and number nodes", () => {
    const host = createMemoryHost<EntryView>("board");
    const prefab = entryPrefab();

    const a = host.createChild(prefab, { resetTransform: true });
    const b = host.createChild(prefab, { resetTransform: true });

    expect(host.name).toBe("board");
    expect(a.node.name).toBe("EntryRow(Clone)");
    expect([a.node.id, b.node.id]).toEqual([1, 2]);
    expect(host.children()).toEqual([a, b]);
    expect(host.stats()).toEqual({ created: 2, destroyed: 0 });
  });

  it("should reset or copy the prefab transform", () => {
    const host = createMemoryHost<EntryView>();
    const transform = identityTransform();
    transform.scale = [3, 3, 3];
    const prefab = entryPrefab({ transform });

    const reset = host.createChild(prefab, { resetTransform: true });
    const kept = host.createChild(prefab, { resetTransform: false });

    expect(reset.node.transform.scale).toEqual([1, 1, 1]);
    expect(kept.node.transform.scale).toEqual([3, 3, 3]);
    expect(kept.node.transform).not.toBe(transform);
  });

  it("should apply the requested size", () => {
    const host = createMemoryHost<EntryView>();

    const view = host.createChild(entryPrefab(), {
      resetTransform: true,
      size: { width: 64, height: 16 },
    });

    expect(view.node.size).toEqual({ width: 64, height: 16 });
  });

  it("should move children and clamp positions past the end", () => {
    const host = createMemoryHost<EntryView>();
    const prefab = entryPrefab();
    const [a, b, c] = [0, 1, 2].map(() =>
      host.createChild(prefab, { resetTransform: true }),
    );
    if (!a || !b || !c) throw new Error("setup failed");

    host.setSiblingOrder(c, 0);
    expect(host.children()).toEqual([c, a, b]);

    host.setSiblingOrder(c, 99);
    expect(host.children()).toEqual([a, b, c]);
  });

  it("should toggle activity and destroy nodes", () => {
    const host = createMemoryHost<EntryView>();
    const view = host.createChild(entryPrefab(), { resetTransform: true });

    host.setActive(view, false);
    expect(view.node.active).toBe(false);

    host.destroy(view);
    expect(view.node.destroyed).toBe(true);
    expect(host.children()).toEqual([]);
    expect(host.stats()).toEqual({ created: 1, destroyed: 1 });
  });

  it("should reject views it does not own", () => {
    const host = createMemoryHost<EntryView>("a");
    const other = createMemoryHost<EntryView>("b");
    const stranger = other.createChild(entryPrefab(), { resetTransform: true });

    let error: unknown;
    try {
      host.setActive(stranger, false);
    } catch (e) {
      error = e;
    }

    expect(isDisplayListError(error, "INVALID_ARGUMENT")).toBe(true);
    expect(stranger.node.active).toBe(true);
  });
});
