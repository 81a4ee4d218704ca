/**
 * slotlist - Element Registry
 * Explicit catalogue of which view types bind which data types. Views
 * register themselves at startup; tooling (scaffolders, inspectors) reads
 * the catalogue instead of scanning loaded code.
 */

import { invalidArgument } from "../errors";

// =============================================================================
// Types
// =============================================================================

export interface ElementType {
  /** Name of the view type */
  readonly view: string;
  /** Names of the data types it can bind, in registration order */
  readonly data: readonly string[];
}

export interface ElementRegistry {
  /**
   * Record that `view` binds `data`. Registering the same view again adds
   * its new data types to the existing entry.
   */
  register: (view: string, data: readonly string[]) => ElementType;
  get: (view: string) => ElementType | undefined;
  /** Every entry, in first-registration order */
  list: () => ElementType[];
  /** Entries whose view binds `data` */
  forData: (data: string) => ElementType[];
  has: (view: string) => boolean;
  clear: () => void;
}

// =============================================================================
// Formatting
// =============================================================================

/** `"ScoreRow (Score, Ghost)"` */
export const describeElementType = (entry: ElementType): string =>
  `${entry.view} (${entry.data.join(", ")})`;

// =============================================================================
// Factory
// =============================================================================

export const createElementRegistry = (): ElementRegistry => {
  const entries = new Map<string, ElementType>();

  const register = (view: string, data: readonly string[]): ElementType => {
    if (typeof view !== "string" || view.trim() === "") {
      throw invalidArgument("register() requires a view type name");
    }
    if (!Array.isArray(data) || data.length === 0) {
      throw invalidArgument(`View type "${view}" must bind at least one data type`);
    }
    for (const name of data) {
      if (typeof name !== "string" || name.trim() === "") {
        throw invalidArgument(`View type "${view}" has an empty data type name`);
      }
    }

    const merged = new Set(entries.get(view)?.data ?? []);
    for (const name of data) merged.add(name);

    const entry: ElementType = { view, data: Array.from(merged) };
    entries.set(view, entry);
    return entry;
  };

  return {
    register,
    get: (view) => entries.get(view),
    list: () => Array.from(entries.values()),
    forData: (data) =>
      Array.from(entries.values()).filter((entry) => entry.data.includes(data)),
    has: (view) => entries.has(view),
    clear: () => entries.clear(),
  };
};
