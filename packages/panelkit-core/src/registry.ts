import type { PanelId } from "@panelkit/interface";
import { UnknownPanelError } from "@panelkit/interface/errors";

/**
 * Append-only id table. Ids are list indices: assigned monotonically and
 * never reused within a session, even after the entry is released.
 */
export class IdentityRegistry<T> {
  private readonly entries: (T | null)[];

  constructor(entries: Iterable<T | null> = []) {
    this.entries = Array.from(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  register(entry: T): PanelId {
    this.entries.push(entry);
    return this.entries.length - 1;
  }

  resolve(id: PanelId | string): T {
    const idx = typeof id === "number" ? id : parsePanelId(id);
    if (idx === null || !Number.isSafeInteger(idx) || idx < 0 || idx >= this.entries.length) {
      throw new UnknownPanelError(id);
    }
    const entry = this.entries[idx];
    if (entry === null) throw new UnknownPanelError(id);
    return entry;
  }

  /** Append a slot as-is; used when rebuilding the table from a snapshot. */
  append(entry: T | null): PanelId {
    this.entries.push(entry);
    return this.entries.length - 1;
  }

  release(id: PanelId): void {
    if (id >= 0 && id < this.entries.length) this.entries[id] = null;
  }

  map<U>(fn: (entry: T, id: PanelId) => U | null): (U | null)[] {
    return this.entries.map((entry, id) => (entry === null ? null : fn(entry, id)));
  }
}

export function parsePanelId(raw: string): PanelId | null {
  if (!/^(0|[1-9]\d*)$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}
