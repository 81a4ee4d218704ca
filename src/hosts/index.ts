/**
 * slotlist - Hosts Domain
 */

export {
  createDomHost,
  elementPrefab,
  resolveRoot,
  type DomHost,
  type DomPrefab,
  type DomView,
} from "./dom";

export {
  createMemoryHost,
  identityTransform,
  type MemoryHost,
  type MemoryHostStats,
  type MemoryPrefab,
  type MemoryView,
  type SceneNode,
  type Transform,
  type Quat,
  type Vec3,
} from "./memory";
