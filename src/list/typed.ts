// src/list/typed.ts
/**
 * slotlist/list — Typed Display List
 * One data type, one view type. Every record is pushed into the view at the
 * same index through the view's own populate().
 */

import type {
  BindableView,
  ChildOptions,
  DataOf,
  DisplayListConfig,
} from "../types";
import { resolveDisplayListConfig } from "../config";
import {
  createListController,
  type ListController,
  type PopulateStats,
} from "./controller";

// =============================================================================
// Types
// =============================================================================

export interface DisplayList<P, V, D>
  extends Omit<
    ListController<P, V>,
    "reconcile" | "acquireAt" | "insert" | "appendElement" | "createChild"
  > {
  /**
   * Records of the last populate, or null before the first one.
   * An empty array means "populated with nothing", which is not the same.
   */
  readonly data: readonly D[] | null;

  /**
   * Bind `records` to the list, reusing pooled views before creating new
   * ones and hiding the surplus.
   *
   * Runs synchronously to completion. A view whose populate() throws aborts
   * the pass with BIND_FAILURE; views bound before it stay bound.
   */
  populate(records: readonly D[]): PopulateStats;

  /** Bind `record` into a pooled (or new) view placed at `index` in [0, count] */
  insert(index: number, record: D): V;

  /** Recycle the view at `index` and drop its record */
  removeAt(index: number): boolean;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a typed list. The record type is taken from the view's populate()
 * parameter unless given explicitly.
 */
export const createDisplayList = <
  P,
  V extends BindableView<D>,
  D = DataOf<V>,
>(
  config: DisplayListConfig<P, V>,
): DisplayList<P, V, D> => {
  const resolved = resolveDisplayListConfig(config);
  const controller = createListController(config, resolved);
  const { host, prefab } = config;

  const childOptions: ChildOptions = {
    resetTransform: resolved.resetTransform,
    size: resolved.size,
  };

  let data: D[] | null = null;

  const instantiate = (): V => host.createChild(prefab, childOptions);

  const bind = (view: V, record: D): void => {
    view.populate(record);
  };

  const populate = (records: readonly D[]): PopulateStats => {
    const stats = controller.reconcile(records, instantiate, bind);
    // Own copy, so later caller mutation can't desync data from the pool
    data = records.slice();
    return stats;
  };

  const insert = (index: number, record: D): V => {
    const view = controller.acquireAt(index, instantiate, (target) =>
      bind(target, record),
    );
    data = data ?? [];
    data.splice(index, 0, record);
    return view;
  };

  const removeAt = (index: number): boolean => {
    const removed = controller.removeAt(index);
    if (removed) {
      data?.splice(index, 1);
    }
    return removed;
  };

  const clear = (): void => {
    controller.clear();
    data = null;
  };

  return {
    host: controller.host,
    config: controller.config,
    get data() {
      return data;
    },
    get count() {
      return controller.count;
    },
    get capacity() {
      return controller.capacity;
    },
    get populating() {
      return controller.populating;
    },
    get: controller.get,
    indexOf: controller.indexOf,
    elements: controller.elements,
    allElements: controller.allElements,
    populate,
    insert,
    removeAt,
    clear,
    on: controller.on,
    off: controller.off,
    once: controller.once,
    [Symbol.iterator]: () => controller[Symbol.iterator](),
  };
};
