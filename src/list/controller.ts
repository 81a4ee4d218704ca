// src/list/controller.ts
/**
 * slotlist/list — List Controller
 * Reconciles a data sequence against the slot pool and fires lifecycle
 * events. Typed and dynamic lists are both built on top of this.
 */

import type {
  BaseListConfig,
  ChildOptions,
  CreateChildOptions,
  DisplayListEvents,
  EventHandler,
  ResolvedListConfig,
  SceneHost,
  Unsubscribe,
} from "../types";
import { DEFAULT_RESET_TRANSFORM, LOG_PREFIX } from "../constants";
import {
  bindFailure,
  invalidArgument,
  invalidState,
  isDisplayListError,
} from "../errors";
import { createEmitter, type Emitter } from "../events";
import { resolveBaseConfig } from "../config";
import { createSlotPool, type SlotPool } from "./pool";

// =============================================================================
// Types
// =============================================================================

/** Binds one record into the view occupying slot `index` */
export type BindFn<V, D> = (view: V, record: D, index: number) => void;

/** What a populate pass did to the pool */
export interface PopulateStats {
  /** Instances created during the pass */
  created: number;
  /** Existing instances rebound during the pass */
  reused: number;
  /** Instances hidden at the end of the pass */
  parked: number;
}

export interface ListController<P, V> extends Iterable<V> {
  readonly host: SceneHost<P, V>;
  readonly config: ResolvedListConfig;

  /** Number of active elements */
  readonly count: number;

  /** Number of instantiated elements, active and pooled */
  readonly capacity: number;

  /** True while a populate pass is running */
  readonly populating: boolean;

  /** Element at `index` in [0, capacity) */
  get(index: number): V;

  /** Position of `view` in the pool, or -1 */
  indexOf(view: V): number;

  /** Active elements, in order */
  elements(): V[];

  /** Every instantiated element, pooled ones after the active ones */
  allElements(): V[];

  /**
   * Run one populate pass.
   *
   * Synchronous: an expensive `bind` blocks the caller (and the host frame)
   * until the whole pass is done. Calling populate again from inside `bind`
   * or from a lifecycle listener fails with INVALID_STATE.
   */
  reconcile<D>(
    records: readonly D[] | null | undefined,
    factory: () => V,
    bind: BindFn<V, D>,
  ): PopulateStats;

  /**
   * Take a pooled element (or create one with `factory`), bind it and place
   * it at `index` in [0, count]. A failed bind recycles the element again
   * and throws BIND_FAILURE.
   */
  acquireAt(index: number, factory: () => V, bind: (view: V) => void): V;

  /** Insert `view` at `index` in [0, count]; `count` appends */
  insert(index: number, view: V | null | undefined): void;

  /** Append `view` after the last active element */
  appendElement(view: V): void;

  /** Recycle the element at `index`; false when there is none */
  removeAt(index: number): boolean;

  /** Instantiate `prefab` through the host and append the new element */
  createChild(prefab: P, options?: CreateChildOptions): V;

  /** Destroy every element. Full teardown only; populate never destroys. */
  clear(): void;

  on<K extends keyof DisplayListEvents<V>>(
    event: K,
    handler: EventHandler<DisplayListEvents<V>[K]>,
  ): Unsubscribe;
  off<K extends keyof DisplayListEvents<V>>(
    event: K,
    handler: EventHandler<DisplayListEvents<V>[K]>,
  ): void;
  once<K extends keyof DisplayListEvents<V>>(
    event: K,
    handler: EventHandler<DisplayListEvents<V>[K]>,
  ): Unsubscribe;
}

// =============================================================================
// Factory
// =============================================================================

/** Reject a missing or non-array data sequence. An empty array is fine. */
export function checkSequence(
  records: unknown,
): asserts records is readonly unknown[] {
  if (records === null || records === undefined) {
    throw invalidArgument(`populate() requires a data sequence, got ${String(records)}`);
  }
  if (!Array.isArray(records)) {
    throw invalidArgument("populate() requires an array");
  }
}

export const createListController = <P, V>(
  config: BaseListConfig<P, V>,
  resolved: ResolvedListConfig = resolveBaseConfig(config),
): ListController<P, V> => {
  const { host } = config;
  const { logger, debug } = resolved;

  const pool: SlotPool<V> = createSlotPool(host, logger);
  const emitter: Emitter<DisplayListEvents<V>> = createEmitter(logger);
  let populating = false;

  const reconcile = <D>(
    records: readonly D[] | null | undefined,
    factory: () => V,
    bind: BindFn<V, D>,
  ): PopulateStats => {
    checkSequence(records);
    if (populating) {
      throw invalidState(
        `populate() called on list "${host.name}" while a populate pass is running`,
      );
    }

    populating = true;
    try {
      const length = records.length;
      const previousCount = pool.count;

      // "Remove" what this pass will not rebind, before any binding starts
      for (let index = length; index < previousCount; index++) {
        emitter.emit("removed", { element: pool.get(index), index });
      }

      let created = 0;
      for (let index = 0; index < length; index++) {
        const slot = pool.getOrCreate(index, factory);
        if (slot.created) {
          created++;
          emitter.emit("instantiated", { element: slot.view, index });
        }

        try {
          bind(slot.view, records[index], index);
        } catch (error) {
          if (isDisplayListError(error)) throw error;
          throw bindFailure(index, error);
        }

        emitter.emit("added", { element: slot.view, index });
      }

      const parked = pool.deactivateFrom(length).length;
      const stats: PopulateStats = {
        created,
        reused: length - created,
        parked,
      };

      if (debug) {
        logger.debug(
          `${LOG_PREFIX} populate "${host.name}": ${length} records, ` +
            `${stats.created} created, ${stats.reused} reused, ${stats.parked} parked ` +
            `(capacity ${pool.capacity})`,
        );
      }
      return stats;
    } finally {
      populating = false;
    }
  };

  const acquireAt = (
    index: number,
    factory: () => V,
    bind: (view: V) => void,
  ): V => {
    if (populating) {
      throw invalidState(
        `Cannot insert into list "${host.name}" while a populate pass is running`,
      );
    }

    const slot = pool.acquireAt(index, factory);
    if (slot.created) {
      emitter.emit("instantiated", { element: slot.view, index });
    }

    try {
      bind(slot.view);
    } catch (error) {
      pool.removeAt(index);
      if (isDisplayListError(error)) throw error;
      throw bindFailure(index, error);
    }

    emitter.emit("added", { element: slot.view, index });
    return slot.view;
  };

  const insert = (index: number, view: V | null | undefined): void => {
    pool.insert(index, view);
    emitter.emit("added", { element: pool.get(index), index });
  };

  const appendElement = (view: V): void => {
    insert(pool.count, view);
  };

  const removeAt = (index: number): boolean => {
    if (!Number.isInteger(index) || index < 0 || index >= pool.count) {
      return false;
    }
    const view = pool.get(index);
    const removed = pool.removeAt(index);
    if (removed) {
      emitter.emit("removed", { element: view, index });
    }
    return removed;
  };

  const createChild = (prefab: P, options: CreateChildOptions = {}): V => {
    const childOptions: ChildOptions = {
      resetTransform: options.resetTransform ?? DEFAULT_RESET_TRANSFORM,
      size: options.size,
    };
    const view = host.createChild(prefab, childOptions);
    const index = pool.count;
    pool.insert(index, view);
    emitter.emit("instantiated", { element: view, index });
    emitter.emit("added", { element: view, index });
    return view;
  };

  const clear = (): void => {
    const active = pool.active();
    active.forEach((element, index) => {
      emitter.emit("removed", { element, index });
    });
    pool.clear();
  };

  return {
    host,
    config: resolved,
    get count() {
      return pool.count;
    },
    get capacity() {
      return pool.capacity;
    },
    get populating() {
      return populating;
    },
    get: (index) => pool.get(index),
    indexOf: (view) => pool.indexOf(view),
    elements: () => pool.active(),
    allElements: () => pool.all(),
    reconcile,
    acquireAt,
    insert,
    appendElement,
    removeAt,
    createChild,
    clear,
    on: emitter.on,
    off: emitter.off,
    once: emitter.once,
    [Symbol.iterator]: () => pool.active()[Symbol.iterator](),
  };
};
