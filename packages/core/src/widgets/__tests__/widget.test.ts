import { assert, describe, test } from "@popframe/testkit";
import { Button } from "../button.js";
import { Label } from "../label.js";
import { Row } from "../row.js";
import { captureLogger, createTestPopup } from "./harness.js";

describe("Widget tree", () => {
  test("addChild reparents a widget that already has a parent", () => {
    const a = new Row();
    const b = new Row();
    const label = a.addChild(new Label("x"));
    b.addChild(label);
    assert.equal(a.children.length, 0);
    assert.deepEqual(b.children, [label]);
    assert.equal(label.parent, b);
  });

  test("removeChild clears the back reference", () => {
    const row = new Row();
    const label = row.addChild(new Label("x"));
    assert.equal(row.removeChild(label), true);
    assert.equal(label.parent, null);
    assert.equal(row.removeChild(label), false);
  });

  test("adding below a popup marks its layout dirty", () => {
    const popup = createTestPopup();
    const row = popup.add.row();
    popup.needsLayout = false;
    row.addChild(new Button("Go"));
    assert.equal(popup.needsLayout, true);
  });

  test("findPopup walks up through containers", () => {
    const popup = createTestPopup();
    const row = popup.add.row();
    const button = row.addChild(new Button("Go"));
    assert.equal(button.findPopup(), popup);
    assert.equal(new Button("Go").findPopup(), null);
  });

  test("capability accessors", () => {
    const button = new Button("Go");
    assert.equal(button.asButton(), button);
    assert.equal(button.asPopup(), null);
    assert.equal(new Label("x").asButton(), null);
  });
});

describe("Widget geometry", () => {
  test("global position adds the title bar and scaled local offsets", () => {
    const popup = createTestPopup("T", { scale: 2 });
    popup.x = 100;
    popup.y = 50;
    const label = popup.addChild(new Label("x"));
    label.x = 20;
    label.y = 10;
    assert.equal(label.globalX, 140);
    assert.equal(label.globalY, 160);
  });

  test("isInside is inclusive on every edge", () => {
    const popup = createTestPopup("T", { scale: 2 });
    popup.x = 100;
    popup.y = 50;
    const label = popup.addChild(new Label("x"));
    label.x = 20;
    label.y = 10;
    label.width = 100;
    label.height = 30;
    assert.equal(label.scaledWidth, 200);
    assert.equal(label.scaledHeight, 60);
    assert.equal(label.isInside(140, 160), true);
    assert.equal(label.isInside(340, 220), true);
    assert.equal(label.isInside(341, 220), false);
    assert.equal(label.isInside(340, 221), false);
  });

  test("a detached widget uses its own coordinates as pixels", () => {
    const label = new Label("x");
    label.x = 7;
    label.y = 9;
    assert.equal(label.globalX, 7);
    assert.equal(label.globalY, 9);
    assert.equal(label.uiScale, 1);
  });

  test("a failing redraw port is logged as a warning", () => {
    const logger = captureLogger();
    const popup = createTestPopup("T", {
      config: { logger },
      redraw: {
        requestRedraw: () => {
          throw new Error("window gone");
        },
      },
    });
    const label = popup.addChild(new Label("x"));
    label.requestRedraw();
    assert.deepEqual(logger.lines.warn, [
      "[popframe][redraw] redraw request failed: Error: window gone",
    ]);
  });
});
