import { expect, test } from "vitest";

import { createCycleController, createInMemorySessionStore } from "@panelkit/core";

import { Basket, SimpleApp, basketPage } from "../src/index.js";

function setup() {
  let next = 0;
  const store = createInMemorySessionStore({
    generateId: () => {
      next += 1;
      return `demo${next}`;
    },
  });
  const controller = createCycleController({ store, root: SimpleApp, panels: [Basket], page: basketPage });
  return { store, controller };
}

test("the first page shows the counter and an empty basket", async () => {
  const { controller } = setup();
  const { sessionId, markup } = await controller.cycle({});

  expect(sessionId).toBe("demo1");
  expect(markup).toBe(
    "<!doctype html>" +
      '<html><head><meta charset="utf-8"><title>Basket demo</title></head><body>' +
      '<form method="post" action="">' +
      '<input type="hidden" name="session_id" value="demo1">' +
      "<h1>Simple app</h1>" +
      "<p>Counter: 1</p>" +
      '<input type="submit" name="eventbutton+add.add.0" value="Add 1"> ' +
      '<a href="?session_id=demo1&amp;n=reset.reset.0">Start over</a>' +
      '<table class="basket"><tr>' +
      '<td><input size="10" type="text" name="1:.:item_name"></td>' +
      '<td><input type="submit" name="eventbutton+add.add.1" value="Add"></td>' +
      "</tr></table>" +
      "</form></body></html>"
  );
});

test("items added to the basket are trimmed, escaped and kept across cycles", async () => {
  const { controller } = setup();
  await controller.cycle({});

  await controller.cycle({ session_id: "demo1", "1:.:item_name": "  pear ", "eventbutton+add.add.1": "Add" });
  await controller.cycle({ session_id: "demo1", "1:.:item_name": "<fig>", "eventbutton+add.add.1": "Add" });
  await controller.cycle({ session_id: "demo1", "1:.:item_name": "", "eventbutton+add.add.1": "Add" });
  const { markup } = await controller.cycle({ session_id: "demo1" });

  expect(markup).toContain('<table class="basket"><tr><td>pear</td></tr><tr><td>&lt;fig&gt;</td></tr><tr><td>');
  expect(markup).toContain("<p>Counter: 1</p>");
});

test("the counter and the basket handle their own events", async () => {
  const { controller } = setup();
  await controller.cycle({});

  const counted = await controller.cycle({
    session_id: "demo1",
    "1:.:item_name": "ignored",
    "eventbutton+add.add.0": "Add 1",
  });
  expect(counted.markup).toContain("<p>Counter: 2</p>");
  expect(counted.markup).toContain('<table class="basket"><tr><td><input');
});

test("start over expires the session", async () => {
  const { store, controller } = setup();
  await controller.cycle({});
  await controller.cycle({ session_id: "demo1", "eventbutton+add.add.0": "Add 1" });
  await controller.cycle({ session_id: "demo1", n: "reset.reset.0" });
  expect(store.get("demo1")?.expired).toBe(true);

  const next = await controller.cycle({ session_id: "demo1" });
  expect(next.sessionId).toBe("demo2");
  expect(next.markup).toContain("<p>Counter: 1</p>");
});
