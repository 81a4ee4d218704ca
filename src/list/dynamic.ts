// src/list/dynamic.ts
/**
 * slotlist/list — Dynamic Display List
 * Heterogeneous records. Caller logic picks (and fills) a view per record;
 * the list only tracks membership. No pooling across view types: every
 * populate tears down the previous children first.
 */

import type {
  BaseListConfig,
  CreateChildOptions,
  SceneHost,
} from "../types";
import { resolveBaseConfig } from "../config";
import {
  bindFailure,
  invalidArgument,
  invalidState,
  isDisplayListError,
  unrecognizedVariant,
} from "../errors";
import {
  checkSequence,
  createListController,
  type ListController,
  type PopulateStats,
} from "./controller";

// =============================================================================
// Types
// =============================================================================

/** What `select` gets to build its view with */
export interface DynamicListContext<P, V> {
  readonly host: SceneHost<P, V>;

  /** Instantiate `prefab` and append it to the list */
  createChild(prefab: P, options?: CreateChildOptions): V;
}

/**
 * Pick, create and fill the view for one record.
 * Returning nothing means the record's shape wasn't recognised.
 */
export type SelectFn<P, V, D> = (
  record: D,
  index: number,
  list: DynamicListContext<P, V>,
) => V | null | undefined;

export interface DynamicListConfig<P, V, D> extends BaseListConfig<P, V> {
  select: SelectFn<P, V, D>;
}

export interface DynamicList<P, V, D>
  extends Omit<ListController<P, V>, "reconcile" | "acquireAt"> {
  /** Records of the last populate, or null before the first one */
  readonly data: readonly D[] | null;

  /**
   * Destroy the current children, then run `select` once per record, in
   * order. Synchronous; a failing record aborts the rest of the pass.
   */
  populate(records: readonly D[]): PopulateStats;

  /** Elements currently shown */
  activeElements(): V[];
}

// =============================================================================
// Factory
// =============================================================================

export const createDynamicList = <P, V, D>(
  config: DynamicListConfig<P, V, D>,
): DynamicList<P, V, D> => {
  const resolved = resolveBaseConfig(config);
  if (typeof config.select !== "function") {
    throw invalidArgument("select must be a function");
  }

  const controller: ListController<P, V> = createListController(config, resolved);
  const { select } = config;

  let data: D[] | null = null;
  let populating = false;

  const populate = (records: readonly D[]): PopulateStats => {
    checkSequence(records);
    if (populating) {
      throw invalidState(
        `populate() called on list "${controller.host.name}" while a populate pass is running`,
      );
    }

    populating = true;
    try {
      const snapshot = records.slice();
      controller.clear();
      data = null;

      let created = 0;
      const context: DynamicListContext<P, V> = {
        host: controller.host,
        createChild: (prefab, options) => {
          created++;
          return controller.createChild(prefab, options);
        },
      };

      snapshot.forEach((record, index) => {
        let view: V | null | undefined;
        try {
          view = select(record, index, context);
        } catch (error) {
          if (isDisplayListError(error)) throw error;
          throw bindFailure(index, error);
        }

        if (view === null || view === undefined) {
          throw unrecognizedVariant(
            `Record ${index} of list "${controller.host.name}" has no matching view`,
            index,
          );
        }
        if (controller.indexOf(view) === -1) {
          controller.appendElement(view);
        }
      });

      data = snapshot;
      return { created, reused: 0, parked: 0 };
    } finally {
      populating = false;
    }
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
      return populating;
    },
    get: controller.get,
    indexOf: controller.indexOf,
    elements: controller.elements,
    activeElements: controller.elements,
    allElements: controller.allElements,
    populate,
    insert: controller.insert,
    appendElement: controller.appendElement,
    removeAt: controller.removeAt,
    createChild: controller.createChild,
    clear: () => {
      controller.clear();
      data = null;
    },
    on: controller.on,
    off: controller.off,
    once: controller.once,
    [Symbol.iterator]: () => controller[Symbol.iterator](),
  };
};

// =============================================================================
// Variant Selector
// =============================================================================

/**
 * Build a `select` from a tag function and one handler per tag.
 * A tag with no handler fails with UNRECOGNIZED_VARIANT.
 *
 * @example
 * ```ts
 * const select = createVariantSelector<Prefab, View, Entry>(
 *   (entry) => entry.kind,
 *   {
 *     header: (entry, _i, list) => bindHeader(list.createChild(headerPrefab), entry),
 *     row: (entry, _i, list) => bindRow(list.createChild(rowPrefab), entry),
 *   },
 * );
 * ```
 */
export const createVariantSelector = <P, V, D>(
  discriminate: (record: D) => string,
  handlers: Partial<Record<string, SelectFn<P, V, D>>>,
): SelectFn<P, V, D> => {
  return (record, index, list) => {
    const tag = discriminate(record);
    const handler = Object.hasOwn(handlers, tag) ? handlers[tag] : undefined;
    if (!handler) {
      throw unrecognizedVariant(`Unrecognized variant "${tag}" at record ${index}`, index);
    }
    return handler(record, index, list);
  };
};
