import type { PanelId, PanelSlot, SessionSnapshot } from "@panelkit/interface";
import { MissingParentError, NoSuchPanelError, StoreError, UnknownPanelError } from "@panelkit/interface/errors";

import { PanelCatalog, type PanelClass } from "./catalog.js";
import type { Panel } from "./panel.js";
import { IdentityRegistry } from "./registry.js";
import type { PanelSession } from "./session.js";

type ArenaNode = {
  tree: PanelTree;
  index: number;
  type: string;
  parent: number | null;
  children: Map<string, number>;
  id: PanelId | null;
  panel: Panel<unknown>;
};

// Panel -> arena node. A panel missing from this map is detached.
const nodes = new WeakMap<Panel<unknown>, ArenaNode>();
// Every panel that has ever joined a tree. A panel joins at most once.
const joined = new WeakSet<Panel<unknown>>();

function nodeOf(panel: Panel<unknown>, message?: string): ArenaNode {
  const node = nodes.get(panel);
  if (!node) throw new MissingParentError(message);
  return node;
}

/**
 * Flat arena of the panels of one session.
 *
 * Parent, child and registry links are arena indices, so a snapshot is plain
 * data. Slot 0 is always the root panel.
 */
export class PanelTree {
  readonly catalog: PanelCatalog;
  readonly registry = new IdentityRegistry<ArenaNode>();
  session: PanelSession | null = null;
  private arena: ArenaNode[] = [];

  private constructor(catalog: PanelCatalog) {
    this.catalog = catalog;
  }

  static of(panel: Panel<unknown>): PanelTree {
    return nodeOf(panel).tree;
  }

  static isAttached(panel: Panel<unknown>): boolean {
    return nodes.has(panel);
  }

  /** Start a new tree around a fresh root panel and run its `init()`. */
  static create(rootClass: PanelClass, catalog: PanelCatalog = new PanelCatalog([rootClass])): PanelTree {
    const tree = new PanelTree(catalog);
    const root = new rootClass();
    tree.bind(root, null);
    root.init();
    return tree;
  }

  static restore(snapshot: SessionSnapshot, catalog: PanelCatalog): PanelTree {
    const tree = new PanelTree(catalog);
    tree.arena = snapshot.nodes.map((slot, index) => {
      const cls = catalog.get(slot.type);
      if (!cls) throw new StoreError(`session record references unknown panel type: ${slot.type}`);
      const panel = new cls();
      panel.state = slot.state;
      const node: ArenaNode = {
        tree,
        index,
        type: slot.type,
        parent: slot.parent,
        children: new Map(Object.entries(slot.children)),
        id: slot.id,
        panel,
      };
      nodes.set(panel, node);
      joined.add(panel);
      return node;
    });

    const claimed = new Set<number>();
    for (const node of tree.arena) {
      for (const [name, childIdx] of node.children) {
        if (claimed.has(childIdx) || tree.arena[childIdx]?.parent !== node.index) {
          throw new StoreError(`nodes[${node.index}].children.${name} does not point back at its parent`);
        }
        claimed.add(childIdx);
      }
      if (node.id !== null && snapshot.registry[node.id] !== node.index) {
        throw new StoreError(`nodes[${node.index}].id is not registered`);
      }
    }
    for (const node of tree.arena) {
      if (node.index !== 0 && !claimed.has(node.index)) {
        throw new StoreError(`nodes[${node.index}] is not listed among its parent's children`);
      }
    }

    const reached = new Set<number>();
    const pending = [0];
    while (pending.length > 0) {
      const idx = pending.pop() ?? 0;
      if (reached.has(idx)) throw new StoreError(`nodes[${idx}] is reached twice from the root`);
      reached.add(idx);
      for (const childIdx of tree.arena[idx]?.children.values() ?? []) pending.push(childIdx);
    }
    if (reached.size !== tree.arena.length) {
      const stray = tree.arena.findIndex((node) => !reached.has(node.index));
      throw new StoreError(`nodes[${stray}] is not reachable from the root`);
    }

    for (const idx of snapshot.registry) tree.registry.append(idx === null ? null : tree.arena[idx] ?? null);
    return tree;
  }

  get root(): Panel<unknown> {
    const root = this.arena[0];
    if (!root) throw new MissingParentError("panel tree has no root");
    return root.panel;
  }

  /** Number of arena slots, including detached panels not yet swept. */
  get size(): number {
    return this.arena.length;
  }

  addPanel<P extends Panel<unknown>>(container: Panel<unknown>, name: string, panel: P): P {
    const parent = nodeOf(container, "cannot add a panel to a detached container");
    if (parent.tree !== this) throw new Error("container belongs to another panel tree");
    if (name.length === 0) throw new Error("panel name must not be empty");
    if (joined.has(panel)) {
      throw new Error(`panel ${name} has already been attached; re-parenting is not supported`);
    }

    const previous = parent.children.get(name);
    if (previous !== undefined) this.detach(previous);

    const node = this.bind(panel, parent.index);
    parent.children.set(name, node.index);
    panel.init();
    return panel;
  }

  removeAllChildren(container: Panel<unknown>): void {
    const node = nodeOf(container);
    for (const childIdx of node.children.values()) this.detach(childIdx);
    node.children.clear();
  }

  panelByName(container: Panel<unknown>, name: string): Panel<unknown> {
    const childIdx = nodeOf(container).children.get(name);
    const child = childIdx === undefined ? null : this.arena[childIdx];
    if (!child) throw new NoSuchPanelError(name);
    return child.panel;
  }

  panels(container: Panel<unknown>): Map<string, Panel<unknown>> {
    const out = new Map<string, Panel<unknown>>();
    for (const [name, childIdx] of nodeOf(container).children) {
      const child = this.arena[childIdx];
      if (child) out.set(name, child.panel);
    }
    return out;
  }

  parentOf(panel: Panel<unknown>): Panel<unknown> {
    const node = nodeOf(panel);
    const parent = node.parent === null ? null : this.arena[node.parent];
    if (!parent) throw new MissingParentError(node.index === 0 ? "the main panel has no parent" : undefined);
    return parent.panel;
  }

  mainPanel(panel: Panel<unknown>): Panel<unknown> {
    let node = nodeOf(panel);
    while (node.parent !== null) {
      const parent = this.arena[node.parent];
      if (!parent) throw new MissingParentError();
      node = parent;
    }
    if (node.index !== 0) throw new MissingParentError();
    return node.panel;
  }

  getOrAssignId(panel: Panel<unknown>): PanelId {
    const node = nodeOf(panel);
    if (node.id === null) node.id = this.registry.register(node);
    return node.id;
  }

  panelById(id: PanelId | string): Panel<unknown> {
    const node = this.registry.resolve(id);
    if (!this.isReachable(node)) throw new UnknownPanelError(id);
    return node.panel;
  }

  render(panel: Panel<unknown>): string {
    this.mainPanel(panel);
    return panel.render();
  }

  /**
   * Drop unreachable panels (releasing their ids), compact the arena and
   * return the persisted form.
   */
  snapshot(): SessionSnapshot {
    const rootNode = this.arena[0];
    if (!rootNode) throw new MissingParentError("panel tree has no root");

    const order: ArenaNode[] = [];
    const visit = (node: ArenaNode) => {
      order.push(node);
      for (const childIdx of node.children.values()) {
        const child = this.arena[childIdx];
        if (child) visit(child);
      }
    };
    visit(rootNode);

    const kept = new Set(order);
    for (const node of this.arena) {
      if (kept.has(node)) continue;
      if (node.id !== null) this.registry.release(node.id);
      if (nodes.get(node.panel) === node) nodes.delete(node.panel);
    }

    const remap = new Map<number, number>(order.map((node, newIdx) => [node.index, newIdx]));
    for (const node of order) {
      node.index = remap.get(node.index) ?? node.index;
      node.parent = node.parent === null ? null : remap.get(node.parent) ?? null;
      node.children = new Map(Array.from(node.children, ([name, idx]) => [name, remap.get(idx) ?? idx]));
    }
    this.arena = order;

    const slots: PanelSlot[] = order.map((node) => ({
      type: node.type,
      parent: node.parent,
      children: Object.fromEntries(node.children),
      id: node.id,
      state: node.panel.state,
    }));
    return { version: 1, nodes: slots, registry: this.registry.map((node) => node.index) };
  }

  private bind(panel: Panel<unknown>, parent: number | null): ArenaNode {
    const node: ArenaNode = {
      tree: this,
      index: this.arena.length,
      type: this.catalog.typeOf(panel),
      parent,
      children: new Map(),
      id: null,
      panel,
    };
    this.arena.push(node);
    nodes.set(panel, node);
    joined.add(panel);
    return node;
  }

  private detach(index: number): void {
    const node = this.arena[index];
    if (!node) return;
    node.parent = null;
    nodes.delete(node.panel);
  }

  private isReachable(node: ArenaNode): boolean {
    if (!nodes.has(node.panel)) return false;
    let current = node;
    while (current.parent !== null) {
      const parent = this.arena[current.parent];
      if (!parent) return false;
      current = parent;
    }
    return current.index === 0;
  }
}
