import type { PanelEvent, PanelId, SessionId } from "@panelkit/interface";
import { HandlerNotFoundError } from "@panelkit/interface/errors";
import { buttonParamName, encodeEventToken, linkHref } from "@panelkit/interface/events";
import { encodeLocalName } from "@panelkit/interface/names";

import { element, escapeHtml, type HtmlAttributes, voidElement } from "./html.js";
import type { PanelSession } from "./session.js";
import { PanelTree } from "./tree.js";

export type EventHandler = (event: PanelEvent) => void;
export type EventHandlers = Readonly<Record<string, EventHandler>>;

export type EventControlOptions = {
  /** Event name; also the routine name unless `routine` is given. */
  name: string;
  routine?: string;
  attrs?: HtmlAttributes;
};

export type EventButtonOptions = EventControlOptions & { label: string };

export type EventLinkOptions = EventControlOptions &
  ({ label: string; img?: undefined } | { img: string; imgAttrs?: HtmlAttributes; label?: undefined });

export type LocalInputOptions = {
  name: string;
  value?: string;
  attrs?: HtmlAttributes;
};

/** A choice whose label is its value, or a value with its own label. */
export type LocalChoice = string | { value: string; label: string };

export type LocalChoiceOptions = {
  name: string;
  choices: readonly LocalChoice[];
  /** Value of the choice shown as selected. */
  value?: string;
  attrs?: HtmlAttributes;
};

function choiceParts(choice: LocalChoice): { value: string; label: string } {
  return typeof choice === "string" ? { value: choice, label: choice } : choice;
}

type PanelConstructor<P> = abstract new (...args: never[]) => P;

/**
 * A stateful component node.
 *
 * Subclasses declare a default `state`, a static `panelType`, and optionally
 * `init()` (runs once, when the panel joins a tree), `render()` and a
 * `handlers` table keyed by routine name:
 *
 * ```ts
 * class Counter extends Panel<{ count: number }> {
 *   static readonly panelType = "counter";
 *   state = { count: 0 };
 *   protected readonly handlers = {
 *     add: () => {
 *       this.state.count += 1;
 *     },
 *   };
 *   render() {
 *     return `${this.state.count} ${this.eventButton({ label: "Add", name: "add" })}`;
 *   }
 * }
 * ```
 *
 * `state` is written into the session record, so it must be plain data.
 */
export abstract class Panel<S = unknown> {
  abstract state: S;
  protected readonly handlers: EventHandlers = {};

  init(): void {}

  render(): string {
    return "";
  }

  get id(): PanelId {
    return PanelTree.of(this).getOrAssignId(this);
  }

  get session(): PanelSession {
    const session = PanelTree.of(this).session;
    if (!session) throw new Error("panel tree is not bound to a session");
    return session;
  }

  get sessionId(): SessionId {
    return this.session.sessionId;
  }

  get attached(): boolean {
    return PanelTree.isAttached(this);
  }

  parent(): Panel<unknown> {
    return PanelTree.of(this).parentOf(this);
  }

  mainPanel(): Panel<unknown> {
    return PanelTree.of(this).mainPanel(this);
  }

  panel(name: string): Panel<unknown>;
  panel<P extends Panel<unknown>>(name: string, type: PanelConstructor<P>): P;
  panel<P extends Panel<unknown>>(name: string, type?: PanelConstructor<P>): Panel<unknown> | P {
    const child = PanelTree.of(this).panelByName(this, name);
    if (type && !(child instanceof type)) {
      throw new TypeError(`panel ${name} is a ${child.constructor.name}, expected ${type.name}`);
    }
    return child;
  }

  panels(): Map<string, Panel<unknown>> {
    return PanelTree.of(this).panels(this);
  }

  addPanel<P extends Panel<unknown>>(name: string, panel: P): P {
    return PanelTree.of(this).addPanel(this, name, panel);
  }

  removePanels(): void {
    PanelTree.of(this).removeAllChildren(this);
  }

  renderPanel(name: string): string {
    const tree = PanelTree.of(this);
    return tree.render(tree.panelByName(this, name));
  }

  handleEvent(routine: string, event: PanelEvent): void {
    if (!Object.prototype.hasOwnProperty.call(this.handlers, routine)) {
      throw new HandlerNotFoundError(this.constructor.name, routine);
    }
    this.handlers[routine](event);
  }

  localName(name: string): string {
    return encodeLocalName(this.id, name);
  }

  /** This panel's inputs from the current request, keyed by local name. */
  localParams(): Record<string, string> {
    return this.session.localParams(this.id);
  }

  eventButton(opts: EventButtonOptions): string {
    const token = encodeEventToken({ name: opts.name, routine: opts.routine, panelId: this.id });
    return voidElement("input", {
      ...opts.attrs,
      type: "submit",
      name: buttonParamName(token),
      value: opts.label,
    });
  }

  eventLink(opts: EventLinkOptions): string {
    const token = encodeEventToken({ name: opts.name, routine: opts.routine, panelId: this.id });
    const content =
      opts.img === undefined ? escapeHtml(opts.label) : voidElement("img", { ...opts.imgAttrs, src: opts.img });
    return element("a", { ...opts.attrs, href: linkHref(this.sessionId, token) }, content);
  }

  localTextfield(opts: LocalInputOptions): string {
    return voidElement("input", { ...opts.attrs, type: "text", name: this.localName(opts.name), value: opts.value });
  }

  localTextarea(opts: LocalInputOptions): string {
    return element("textarea", { ...opts.attrs, name: this.localName(opts.name) }, escapeHtml(opts.value ?? ""));
  }

  localSelect(opts: LocalChoiceOptions): string {
    const options = opts.choices.map((choice) => {
      const { value, label } = choiceParts(choice);
      return element("option", { value, selected: value === opts.value }, escapeHtml(label));
    });
    return element("select", { ...opts.attrs, name: this.localName(opts.name) }, options.join(""));
  }

  localRadioGroup(opts: LocalChoiceOptions): string {
    const name = this.localName(opts.name);
    return opts.choices
      .map((choice) => {
        const { value, label } = choiceParts(choice);
        const input = voidElement("input", { ...opts.attrs, type: "radio", name, value, checked: value === opts.value });
        return element("label", {}, `${input} ${escapeHtml(label)}`);
      })
      .join("");
  }
}
