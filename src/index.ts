/**
 * slotlist - Pooled display lists for retained-mode scene graphs
 * Reuse view instances across repopulation; hide the surplus, never destroy it
 *
 * @packageDocumentation
 */

// Lists
export {
  createDisplayList,
  createDynamicList,
  createVariantSelector,
  createListController,
  createSlotPool,
  type DisplayList,
  type DynamicList,
  type DynamicListConfig,
  type DynamicListContext,
  type SelectFn,
  type ListController,
  type BindFn,
  type PopulateStats,
  type SlotPool,
  type SlotLookup,
  type Slot,
} from "./list";

// Core Types
export type {
  SceneHost,
  BindableView,
  DataOf,
  Size,
  CreateChildOptions,
  ChildOptions,
  ElementEvent,
  DisplayListEvents,
  Logger,
  BaseListConfig,
  DisplayListConfig,
  ResolvedListConfig,
  EventHandler,
  Unsubscribe,
} from "./types";

// Errors
export {
  DisplayListError,
  isDisplayListError,
  type DisplayListErrorCode,
} from "./errors";

// Hosts
export {
  createDomHost,
  elementPrefab,
  createMemoryHost,
  identityTransform,
  type DomHost,
  type DomPrefab,
  type DomView,
  type MemoryHost,
  type MemoryPrefab,
  type MemoryView,
  type SceneNode,
  type Transform,
} from "./hosts";

// Registry
export {
  createElementRegistry,
  describeElementType,
  type ElementRegistry,
  type ElementType,
} from "./registry";

// Events domain
export { createEmitter, type Emitter } from "./events";
