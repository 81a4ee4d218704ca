/**
 * slotlist/list - Public exports
 */

export { createSlotPool, type Slot, type SlotLookup, type SlotPool } from "./pool";

export {
  createListController,
  checkSequence,
  type BindFn,
  type ListController,
  type PopulateStats,
} from "./controller";

export { createDisplayList, type DisplayList } from "./typed";

export {
  createDynamicList,
  createVariantSelector,
  type DynamicList,
  type DynamicListConfig,
  type DynamicListContext,
  type SelectFn,
} from "./dynamic";
