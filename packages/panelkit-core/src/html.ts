import type { SessionId } from "@panelkit/interface";
import { SESSION_PARAM } from "@panelkit/interface/events";

export type HtmlAttributes = Readonly<Record<string, string | number | boolean | null | undefined>>;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderAttributes(attrs: HtmlAttributes): string {
  let out = "";
  for (const [name, value] of Object.entries(attrs)) {
    if (value === undefined || value === null || value === false) continue;
    out += value === true ? ` ${name}` : ` ${name}="${escapeHtml(String(value))}"`;
  }
  return out;
}

/** `content` is inserted as markup; escape text before passing it in. */
export function element(tag: string, attrs: HtmlAttributes, content = ""): string {
  return `<${tag}${renderAttributes(attrs)}>${content}</${tag}>`;
}

export function voidElement(tag: string, attrs: HtmlAttributes): string {
  return `<${tag}${renderAttributes(attrs)}>`;
}

export function hiddenSessionField(sessionId: SessionId): string {
  return voidElement("input", { type: "hidden", name: SESSION_PARAM, value: sessionId });
}
