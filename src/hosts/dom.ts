// src/hosts/dom.ts
/**
 * slotlist/hosts — DOM Host
 * List children are deep clones of a template element, kept under one root.
 * Hidden slots use the `hidden` attribute; order is DOM order.
 */

import type { ChildOptions, SceneHost } from "../types";
import { DOM_SLOT_ATTRIBUTE } from "../constants";
import { invalidArgument } from "../errors";

// =============================================================================
// Types
// =============================================================================

export interface DomView {
  readonly element: HTMLElement;
}

export interface DomPrefab<V extends DomView> {
  /** Element cloned for every instance; never attached itself */
  template: HTMLElement;
  /** Wrap a fresh clone in its view */
  create: (element: HTMLElement) => V;
}

export interface DomHost<V extends DomView> extends SceneHost<DomPrefab<V>, V> {
  readonly root: HTMLElement;
}

// =============================================================================
// Container Resolution
// =============================================================================

export const resolveRoot = (root: HTMLElement | string): HTMLElement => {
  if (typeof root === "string") {
    const el = document.querySelector<HTMLElement>(root);
    if (!el) throw invalidArgument(`Root not found: ${root}`);
    return el;
  }
  return root;
};

const ELEMENT_NODE = 1;

const isHTMLElement = (node: Node): node is HTMLElement =>
  node.nodeType === ELEMENT_NODE && "style" in node;

// Inline properties that place an element; cleared on reset
const TRANSFORM_PROPERTIES = ["transform", "translate", "rotate", "scale"];

// =============================================================================
// DOM Host Factory
// =============================================================================

export const createDomHost = <V extends DomView>(
  container: HTMLElement | string,
): DomHost<V> => {
  const root = resolveRoot(container);
  const name =
    root.id || root.getAttribute("class") || root.tagName.toLowerCase();

  const slotted = (except: HTMLElement): Element[] =>
    Array.from(root.children).filter(
      (child) => child !== except && child.hasAttribute(DOM_SLOT_ATTRIBUTE),
    );

  const owned = (view: V): HTMLElement => {
    if (view.element.parentElement !== root) {
      throw invalidArgument(`Element is not a child of "${name}"`);
    }
    return view.element;
  };

  const createChild = (prefab: DomPrefab<V>, options: ChildOptions): V => {
    const clone = prefab.template.cloneNode(true);
    if (!isHTMLElement(clone)) {
      throw invalidArgument("Prefab template must be an HTML element");
    }

    clone.removeAttribute("id");
    clone.setAttribute(DOM_SLOT_ATTRIBUTE, "");
    clone.hidden = false;

    if (options.resetTransform) {
      for (const property of TRANSFORM_PROPERTIES) {
        clone.style.removeProperty(property);
      }
    }
    if (options.size) {
      clone.style.width = `${options.size.width}px`;
      clone.style.height = `${options.size.height}px`;
    }

    const view = prefab.create(clone);
    const last = slotted(clone).at(-1);
    root.insertBefore(clone, last ? last.nextSibling : null);
    return view;
  };

  const destroy = (view: V): void => {
    owned(view).remove();
  };

  const setActive = (view: V, active: boolean): void => {
    owned(view).hidden = !active;
  };

  const setSiblingOrder = (view: V, position: number): void => {
    const element = owned(view);
    const siblings = slotted(element);
    const anchor = siblings[Math.max(0, position)];
    if (anchor) {
      root.insertBefore(element, anchor);
      return;
    }
    const last = siblings.at(-1);
    root.insertBefore(element, last ? last.nextSibling : null);
  };

  return {
    root,
    name,
    createChild,
    destroy,
    setActive,
    setSiblingOrder,
  };
};

/** Prefab whose view is just the cloned element */
export const elementPrefab = (template: HTMLElement): DomPrefab<DomView> => ({
  template,
  create: (element) => ({ element }),
});
