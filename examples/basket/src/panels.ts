import { Panel, type PanelSession, defaultPage, element, escapeHtml } from "@panelkit/core";

export class Basket extends Panel<{ contents: string[] }> {
  static readonly panelType = "basket";
  state: { contents: string[] } = { contents: [] };

  protected readonly handlers = {
    add: () => {
      const item = this.localParams().item_name?.trim();
      if (item) this.state.contents.push(item);
    },
  };

  render(): string {
    const rows = this.state.contents.map((item) => `<tr><td>${escapeHtml(item)}</td></tr>`).join("");
    const form =
      `<td>${this.localTextfield({ name: "item_name", attrs: { size: 10 } })}</td>` +
      `<td>${this.eventButton({ label: "Add", name: "add" })}</td>`;
    return element("table", { class: "basket" }, `${rows}<tr>${form}</tr>`);
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
  };

  init(): void {
    this.addPanel("basket", new Basket());
  }

  render(): string {
    return (
      "<h1>Simple app</h1>" +
      `<p>Counter: ${this.state.count}</p>` +
      this.eventButton({ label: "Add 1", name: "add" }) +
      " " +
      this.eventLink({ label: "Start over", name: "reset" }) +
      this.renderPanel("basket")
    );
  }
}

export function basketPage(body: string, session: PanelSession): string {
  return (
    "<!doctype html>" +
    '<html><head><meta charset="utf-8"><title>Basket demo</title></head>' +
    `<body>${defaultPage(body, session)}</body></html>`
  );
}
