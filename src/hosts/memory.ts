/**
 * slotlist - Memory Host
 * Headless scene graph: plain nodes under one named root. Useful on a game
 * server, in tools, and anywhere a list should run without a renderer.
 */

import type { ChildOptions, SceneHost, Size } from "../types";
import { invalidArgument } from "../errors";

// =============================================================================
// Types
// =============================================================================

export type Vec3 = [number, number, number];
export type Quat = [number, number, number, number];

export interface Transform {
  position: Vec3;
  rotation: Quat;
  scale: Vec3;
}

export interface SceneNode {
  readonly id: number;
  readonly name: string;
  active: boolean;
  transform: Transform;
  size: Size | null;
  destroyed: boolean;
}

/** Anything the memory host can own: a view wrapping one scene node */
export interface MemoryView {
  readonly node: SceneNode;
}

export interface MemoryPrefab<V extends MemoryView> {
  name: string;
  /** Transform kept when a child is created without a reset */
  transform?: Transform;
  size?: Size;
  instantiate: (node: SceneNode) => V;
}

export interface MemoryHostStats {
  created: number;
  destroyed: number;
}

export interface MemoryHost<V extends MemoryView>
  extends SceneHost<MemoryPrefab<V>, V> {
  /** Live children in sibling order */
  children: () => V[];
  stats: () => MemoryHostStats;
}

// =============================================================================
// Transforms
// =============================================================================

export const identityTransform = (): Transform => ({
  position: [0, 0, 0],
  rotation: [0, 0, 0, 1],
  scale: [1, 1, 1],
});

const copyTransform = (t: Transform): Transform => ({
  position: [...t.position],
  rotation: [...t.rotation],
  scale: [...t.scale],
});

// =============================================================================
// Factory
// =============================================================================

export const createMemoryHost = <V extends MemoryView>(
  name = "root",
): MemoryHost<V> => {
  const children: V[] = [];
  let nextId = 1;
  let created = 0;
  let destroyed = 0;

  const indexOfChild = (view: V): number => {
    const index = children.indexOf(view);
    if (index === -1) {
      throw invalidArgument(`Node ${view.node.id} is not a child of "${name}"`);
    }
    return index;
  };

  const createChild = (prefab: MemoryPrefab<V>, options: ChildOptions): V => {
    const node: SceneNode = {
      id: nextId++,
      name: `${prefab.name}(Clone)`,
      active: true,
      transform: options.resetTransform
        ? identityTransform()
        : copyTransform(prefab.transform ?? identityTransform()),
      size: options.size ?? prefab.size ?? null,
      destroyed: false,
    };

    const view = prefab.instantiate(node);
    children.push(view);
    created++;
    return view;
  };

  const destroy = (view: V): void => {
    const index = indexOfChild(view);
    children.splice(index, 1);
    view.node.active = false;
    view.node.destroyed = true;
    destroyed++;
  };

  const setActive = (view: V, active: boolean): void => {
    indexOfChild(view);
    view.node.active = active;
  };

  const setSiblingOrder = (view: V, position: number): void => {
    const index = indexOfChild(view);
    children.splice(index, 1);
    const target = Math.max(0, Math.min(position, children.length));
    children.splice(target, 0, view);
  };

  return {
    name,
    createChild,
    destroy,
    setActive,
    setSiblingOrder,
    children: () => children.slice(),
    stats: () => ({ created, destroyed }),
  };
};
