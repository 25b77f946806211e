import { expect, test } from "vitest";

import { PanelCatalog, PanelSession, PanelTree, createRequestContext } from "../src/index.js";
import { Basket, SimpleApp } from "./fixtures.js";

const catalog = new PanelCatalog([SimpleApp, Basket]);

function sessionTree(): PanelTree {
  const tree = PanelTree.create(SimpleApp, catalog);
  new PanelSession({ sessionId: "s9", tree, request: createRequestContext({}) });
  return tree;
}

test("an event link can show an image instead of a label", () => {
  const { root } = sessionTree();
  expect(root.eventLink({ name: "reset", img: "/reset.png", imgAttrs: { alt: "Reset" } })).toBe(
    '<a href="?session_id=s9&amp;n=reset.reset.0"><img alt="Reset" src="/reset.png"></a>'
  );
});

test("a local textarea escapes its value", () => {
  const { root } = sessionTree();
  expect(root.localTextarea({ name: "notes", value: '<b>"x" & y</b>' })).toBe(
    '<textarea name="0:.:notes">&lt;b&gt;&quot;x&quot; &amp; y&lt;/b&gt;</textarea>'
  );
});

test("a local select marks the current value", () => {
  const { root } = sessionTree();
  expect(root.localSelect({ name: "pick", choices: ["a", { value: "b", label: "B & co" }], value: "b" })).toBe(
    '<select name="0:.:pick"><option value="a">a</option><option value="b" selected>B &amp; co</option></select>'
  );
});

test("a local radio group checks the current value", () => {
  const { root } = sessionTree();
  expect(
    root.localRadioGroup({ name: "pick", choices: ["a", { value: "b", label: "B & co" }], value: "a", attrs: { class: "r" } })
  ).toBe(
    '<label><input class="r" type="radio" name="0:.:pick" value="a" checked> a</label>' +
      '<label><input class="r" type="radio" name="0:.:pick" value="b"> B &amp; co</label>'
  );
});
