/**
 * slotlist - Shared test fixtures
 * A bindable view on the memory host, and a logger that records calls
 */

import { vi } from "vitest";
import type { BindableView } from "../src/types";
import type {
  MemoryPrefab,
  MemoryView,
  Transform,
} from "../src/hosts/memory";

export interface Entry {
  id: string;
  label: string;
}

export interface EntryView extends MemoryView, BindableView<Entry> {
  /** Every record pushed into this view, oldest first */
  readonly bound: Entry[];
}

/** Records whose label equals `failOn` make populate() throw */
export const entryPrefab = (
  options: { failOn?: string; transform?: Transform } = {},
): MemoryPrefab<EntryView> => ({
  name: "EntryRow",
  transform: options.transform,
  instantiate: (node) => {
    const bound: Entry[] = [];
    return {
      node,
      bound,
      populate(data: Entry) {
        if (data.label === options.failOn) {
          throw new Error(`cannot bind ${data.label}`);
        }
        bound.push(data);
      },
    };
  },
});

export const entries = (...labels: string[]): Entry[] =>
  labels.map((label) => ({ id: label.toLowerCase(), label }));

export const createTestLogger = () => ({
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});
