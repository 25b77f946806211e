import type { Panel } from "./panel.js";

/**
 * A concrete panel type. `panelType` names it inside session records, so it
 * must stay stable across deployments.
 */
export type PanelClass = {
  readonly panelType: string;
  new (): Panel<unknown>;
};

export class PanelCatalog {
  private readonly byType = new Map<string, PanelClass>();
  private readonly byConstructor = new Map<unknown, string>();

  constructor(classes: Iterable<PanelClass> = []) {
    for (const cls of classes) this.register(cls);
  }

  register(cls: PanelClass): this {
    const type = cls.panelType;
    if (typeof type !== "string" || type.length === 0) throw new Error("panelType must be a non-empty string");
    const existing = this.byType.get(type);
    if (existing && existing !== cls) throw new Error(`duplicate panel type: ${type}`);
    this.byType.set(type, cls);
    this.byConstructor.set(cls, type);
    return this;
  }

  get(type: string): PanelClass | undefined {
    return this.byType.get(type);
  }

  has(cls: PanelClass): boolean {
    return this.byConstructor.has(cls);
  }

  typeOf(panel: Panel<unknown>): string {
    const type = this.byConstructor.get(panel.constructor);
    if (type === undefined) {
      throw new Error(`panel class ${panel.constructor.name} is not registered in the panel catalog`);
    }
    return type;
  }
}
