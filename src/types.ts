/**
 * slotlist - Core Types
 * Host contract, view capability, lifecycle events and configuration
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler type */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Host Scene Graph
// =============================================================================

/** Width/height applied to a freshly created child */
export interface Size {
  width: number;
  height: number;
}

/** Options for instantiating a prefab under the host root */
export interface CreateChildOptions {
  /** Reset position, rotation and scale to identity (default: true) */
  resetTransform?: boolean;

  /** Explicit size for the new instance */
  size?: Size;
}

/** Child options after defaults are applied */
export interface ChildOptions extends CreateChildOptions {
  resetTransform: boolean;
}

/**
 * The four primitives the list needs from a retained-mode scene graph.
 *
 * `P` is whatever the host instantiates from (a prefab, a template element),
 * `V` the view instance handed back. The list never touches rendering state
 * beyond these calls.
 */
export interface SceneHost<P, V> {
  /** Name of the root the instances live under (used in diagnostics) */
  readonly name: string;

  /** Instantiate `prefab` as a child of the root and return the view */
  createChild(prefab: P, options: ChildOptions): V;

  /** Destroy an instance for good */
  destroy(view: V): void;

  /** Show or hide an instance */
  setActive(view: V, active: boolean): void;

  /**
   * Move an instance to `position` among the root's list children.
   * Positions past the last child place it last.
   */
  setSiblingOrder(view: V, position: number): void;
}

// =============================================================================
// Views
// =============================================================================

/** A view that can be filled from one data record */
export interface BindableView<D> {
  /** Push `data` into the view. May throw when the record is malformed. */
  populate(data: D): void;
}

/** Record type a view binds, read off its populate() parameter */
export type DataOf<V> = V extends BindableView<infer D> ? D : never;

// =============================================================================
// Lifecycle Events
// =============================================================================

/** Payload shared by every lifecycle event */
export interface ElementEvent<V> {
  element: V;
  index: number;
}

/** Events emitted by every list */
export interface DisplayListEvents<V> extends EventMap {
  /** A new instance was created and added to the pool (once per instance) */
  instantiated: ElementEvent<V>;

  /** An instance logically joined the list, whether new or reused */
  added: ElementEvent<V>;

  /** An instance logically left the list */
  removed: ElementEvent<V>;
}

// =============================================================================
// Logging
// =============================================================================

/** The part of `console` the lists write to */
export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// =============================================================================
// Configuration
// =============================================================================

/** Options shared by every list */
export interface BaseListConfig<P, V> {
  /** Scene graph the instances are created in */
  host: SceneHost<P, V>;

  /** Log surface (default: console) */
  logger?: Logger;

  /** Emit debug output for every populate pass (default: false) */
  debug?: boolean;
}

/** Configuration for a homogeneous, typed list */
export interface DisplayListConfig<P, V> extends BaseListConfig<P, V> {
  /** Prefab instantiated for every new slot */
  prefab: P;

  /** Reset the transform of new instances (default: true) */
  resetTransform?: boolean;

  /** Size applied to new instances */
  size?: Size;
}

/** Resolved configuration (after defaults are applied) */
export interface ResolvedListConfig {
  readonly logger: Logger;
  readonly debug: boolean;
  readonly resetTransform: boolean;
  readonly size: Size | undefined;
}
