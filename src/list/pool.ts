// src/list/pool.ts
/**
 * slotlist/list — Slot Pool
 * Ordered view instances with activation state. Surplus instances are
 * hidden and parked at the tail, never destroyed, until clear().
 *
 * Sibling order under the host root always mirrors pool order, so a parked
 * slot that gets reactivated at index k is already at visual position k.
 */

import type { Logger, SceneHost } from "../types";
import { LOG_PREFIX } from "../constants";
import {
  indexOutOfRange,
  invalidArgument,
  invalidState,
} from "../errors";

// =============================================================================
// Types
// =============================================================================

export interface Slot<V> {
  readonly view: V;
  active: boolean;
}

/** Result of asking the pool for a slot */
export interface SlotLookup<V> {
  view: V;
  /** True when the instance had to be created for this request */
  created: boolean;
}

export interface SlotPool<V> {
  /** Number of slots ever created (active + pooled) */
  readonly capacity: number;

  /** Number of active slots; they occupy [0, count) */
  readonly count: number;

  /**
   * Return the slot at `index`, activating it if it was pooled, or create
   * it with `factory` when `index === capacity`.
   * Indices must arrive in ascending contiguous order: anything past
   * `count` fails with INVALID_STATE.
   */
  getOrCreate: (index: number, factory: () => V) => SlotLookup<V>;

  /**
   * Take the first pooled slot (or a new one) and place it, active,
   * at `index` in [0, count].
   */
  acquireAt: (index: number, factory: () => V) => SlotLookup<V>;

  /** Hide every slot at or past `start`; returns the ones that were active */
  deactivateFrom: (start: number) => V[];

  /** Adopt `view` as an active slot at `index` in [0, count] */
  insert: (index: number, view: V | null | undefined) => void;

  /** Recycle the active slot at `index` to the tail. False when out of range. */
  removeAt: (index: number) => boolean;

  /** Destroy every instance through the host and empty the pool */
  clear: () => void;

  get: (index: number) => V;
  isActive: (index: number) => boolean;
  indexOf: (view: V) => number;

  /** Active instances, in order */
  active: () => V[];

  /** Every instance, in pool order */
  all: () => V[];
}

// =============================================================================
// Factory
// =============================================================================

export const createSlotPool = <P, V>(
  host: SceneHost<P, V>,
  logger: Pick<Logger, "error"> = console,
): SlotPool<V> => {
  const slots: Slot<V>[] = [];
  let count = 0;

  const slotAt = (index: number): Slot<V> => {
    const slot = slots[index];
    if (slot === undefined) {
      throw indexOutOfRange(index, 0, slots.length - 1);
    }
    return slot;
  };

  const activate = (slot: Slot<V>): void => {
    if (slot.active) return;
    host.setActive(slot.view, true);
    slot.active = true;
    count++;
  };

  const park = (slot: Slot<V>): void => {
    if (!slot.active) return;
    host.setActive(slot.view, false);
    slot.active = false;
    count--;
  };

  const getOrCreate = (index: number, factory: () => V): SlotLookup<V> => {
    if (!Number.isInteger(index) || index < 0) {
      throw indexOutOfRange(index, 0, count);
    }
    if (index > count) {
      throw invalidState(
        `Slot ${index} requested past the active range (count ${count}, capacity ${slots.length})`,
        index,
      );
    }

    if (index < slots.length) {
      const slot = slotAt(index);
      activate(slot);
      return { view: slot.view, created: false };
    }

    // index === count === capacity: nothing pooled, grow by one
    const view = factory();
    host.setActive(view, true);
    slots.push({ view, active: true });
    count++;
    return { view, created: true };
  };

  const move = (from: number, to: number): void => {
    if (from === to) return;
    const [slot] = slots.splice(from, 1);
    if (slot === undefined) return;
    slots.splice(to, 0, slot);
    host.setSiblingOrder(slot.view, to);
  };

  const acquireAt = (index: number, factory: () => V): SlotLookup<V> => {
    if (!Number.isInteger(index) || index < 0 || index > count) {
      throw indexOutOfRange(index, 0, count);
    }
    const lookup = getOrCreate(count, factory);
    move(count - 1, index);
    return lookup;
  };

  const deactivateFrom = (start: number): V[] => {
    if (!Number.isInteger(start) || start < 0) {
      throw indexOutOfRange(start, 0, slots.length);
    }

    const parked: V[] = [];
    for (let i = start; i < slots.length; i++) {
      const slot = slotAt(i);
      if (slot.active) {
        park(slot);
        parked.push(slot.view);
      }
    }

    if (parked.length > 0) {
      // Park in pool order so the inactive range keeps instantiation order
      const last = slots.length - 1;
      for (let i = start; i < slots.length; i++) {
        host.setSiblingOrder(slotAt(i).view, last);
      }
    }

    return parked;
  };

  const insert = (index: number, view: V | null | undefined): void => {
    if (!Number.isInteger(index) || index < 0 || index > count) {
      throw indexOutOfRange(index, 0, count);
    }
    if (view === null || view === undefined) {
      logger.error(
        `${LOG_PREFIX} Element could not be inserted into list "${host.name}" at ${index}, element: ${String(view)}`,
      );
      throw invalidArgument(`Cannot insert a missing element at ${index}`);
    }
    if (indexOf(view) !== -1) {
      throw invalidArgument(`Element is already in list "${host.name}"`);
    }

    // Host first: a view the host refuses must leave the pool untouched
    host.setSiblingOrder(view, index);
    host.setActive(view, true);
    slots.splice(index, 0, { view, active: true });
    count++;
  };

  const removeAt = (index: number): boolean => {
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      return false;
    }

    const [slot] = slots.splice(index, 1);
    if (slot === undefined) return false;

    park(slot);
    slots.push(slot);
    host.setSiblingOrder(slot.view, slots.length - 1);
    return true;
  };

  const clear = (): void => {
    const doomed = slots.splice(0, slots.length);
    count = 0;
    for (const slot of doomed) {
      host.destroy(slot.view);
    }
  };

  const indexOf = (view: V): number =>
    slots.findIndex((slot) => slot.view === view);

  return {
    get capacity() {
      return slots.length;
    },
    get count() {
      return count;
    },
    getOrCreate,
    acquireAt,
    deactivateFrom,
    insert,
    removeAt,
    clear,
    get: (index) => slotAt(index).view,
    isActive: (index) => slotAt(index).active,
    indexOf,
    active: () => slots.slice(0, count).map((slot) => slot.view),
    all: () => slots.map((slot) => slot.view),
  };
};
