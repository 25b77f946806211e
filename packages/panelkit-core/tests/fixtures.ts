import { Panel, escapeHtml } from "../src/index.js";

export class Basket extends Panel<{ contents: string[] }> {
  static readonly panelType = "basket";
  state: { contents: string[] } = { contents: [] };

  protected readonly handlers = {
    add: () => {
      const item = this.localParams().item_name;
      if (item) this.state.contents.push(item);
    },
    clear: () => {
      this.state.contents = [];
    },
  };

  render(): string {
    const rows = this.state.contents.map((item) => `<li>${escapeHtml(item)}</li>`).join("");
    return `<ul>${rows}</ul>${this.localTextfield({ name: "item_name" })}${this.eventButton({ label: "Add", name: "add" })}`;
  }
}

export class SimpleApp extends Panel<{ count: number }> {
  static readonly panelType = "simple-app";
  state = { count: 1 };

  protected readonly handlers = {
    add: () => {
      this.state.count += 1;
    },
    reset: () => {
      this.session.expire();
    },
    explode: () => {
      this.state.count = 100;
      throw new Error("handler failed");
    },
  };

  init(): void {
    this.addPanel("basket", new Basket());
  }

  render(): string {
    return (
      `<p>count: ${this.state.count}</p>` +
      this.eventButton({ label: "Add 1", name: "add" }) +
      this.eventLink({ label: "Start over", name: "reset" }) +
      this.renderPanel("basket")
    );
  }
}

/** Two panels of the same type, to exercise local parameter isolation. */
export class TwoBaskets extends Panel<{ opened: number }> {
  static readonly panelType = "two-baskets";
  state = { opened: 0 };

  protected readonly handlers = {
    rebuild: () => {
      this.removePanels();
      this.addPanel("left", new Basket());
      this.state.opened += 1;
    },
  };

  init(): void {
    this.addPanel("left", new Basket());
    this.addPanel("right", new Basket());
  }

  render(): string {
    return Array.from(this.panels().keys(), (name) => `<div>${this.renderPanel(name)}</div>`).join("");
  }
}

export function sequentialIds(prefix = "s"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}${next}`;
  };
}
