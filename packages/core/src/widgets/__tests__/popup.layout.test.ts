import { assert, describe, test } from "@popframe/testkit";
import { PopupUiError } from "../../errors.js";
import { RecordingBackend } from "../../testing/recordingBackend.js";
import { Button } from "../button.js";
import { Label } from "../label.js";
import type { Popup } from "../popup.js";
import { createTestPopup } from "./harness.js";

const REGION = { width: 800, height: 600 };

function messagePopup(scale = 1): Popup {
  const popup = createTestPopup("Notice", { scale, popup: { message: "hello" } });
  popup.updateLayout(REGION);
  return popup;
}

function longPopup(): Popup {
  const popup = createTestPopup("Log");
  for (let i = 0; i < 20; i++) popup.add.label(`line ${i}`);
  popup.updateLayout(REGION);
  return popup;
}

function hostError(fn: () => void): PopupUiError | null {
  try {
    fn();
  } catch (err) {
    if (err instanceof PopupUiError) return err;
    throw err;
  }
  return null;
}

describe("Popup layout", () => {
  test("fits its content and centers in the region", () => {
    const popup = messagePopup();
    assert.equal(popup.width, 400);
    assert.equal(popup.height, 154);
    assert.equal(popup.x, 200);
    assert.equal(popup.y, 223);
    assert.equal(popup.isScrollable, false);
    assert.equal(popup.scrollbar, null);
  });

  test("height is the smaller of content and cap, scrolling exactly when content overflows", () => {
    // title 45 + padding 10 + n labels (27 + 10 each) + OK 42 + margin 20; cap 450
    for (let n = 1; n <= 14; n++) {
      const popup = createTestPopup("Log");
      for (let i = 0; i < n; i++) popup.add.label(`line ${i}`);
      popup.updateLayout(REGION);
      const natural = 117 + 37 * n;
      assert.equal(popup.height, Math.min(natural, 450), `height with ${n} labels`);
      assert.equal(popup.isScrollable, natural > 450, `scrollable with ${n} labels`);
    }
  });

  test("injects a default OK button that also answers Enter", () => {
    const popup = messagePopup();
    const [label, button] = popup.children;
    assert.equal(popup.children.length, 2);
    assert.equal(button?.asButton()?.text, "OK");
    assert.notEqual(popup.onEnter, null);

    assert.deepEqual([label?.globalX, label?.globalY], [220, 278]);
    assert.deepEqual(
      [button?.globalX, button?.globalY, button?.width, button?.height],
      [220, 315, 360, 42],
    );
  });

  test("preventClose suppresses the default button", () => {
    const popup = createTestPopup("Busy", { popup: { message: "hello", preventClose: true } });
    popup.updateLayout(REGION);
    assert.equal(popup.children.length, 1);
    assert.equal(popup.height, 102);
    assert.equal(popup.onEnter, null);
  });

  test("a button inside a row counts as the popup's button", () => {
    const popup = createTestPopup();
    popup.add.row().add.button("Yes").button("No");
    popup.updateLayout(REGION);
    assert.equal(popup.children.length, 1);
    assert.equal(popup.hasButton(), true);
  });

  test("rejects a missing or empty region without touching the tree", () => {
    const popup = createTestPopup("Notice", { popup: { message: "hello" } });
    assert.equal(hostError(() => popup.updateLayout(null))?.code, "POPUP_HOST_UNAVAILABLE");
    assert.equal(
      hostError(() => popup.updateLayout({ width: 0, height: 600 }))?.code,
      "POPUP_HOST_UNAVAILABLE",
    );
    assert.equal(popup.children.length, 1);
    assert.equal(popup.region, null);
  });

  test("scale multiplies pixels but not logical layout", () => {
    const popup = messagePopup(2);
    assert.equal(popup.height, 154);
    assert.equal(popup.scaledHeight, 308);
    assert.equal(popup.x, 0);
    assert.equal(popup.y, 146);
  });

  test("an explicit height is kept when content is shorter", () => {
    const popup = createTestPopup("Fixed", { popup: { message: "hello", height: 200 } });
    popup.updateLayout(REGION);
    assert.equal(popup.autoHeight, false);
    assert.equal(popup.height, 200);
    assert.equal(popup.y, 200);
  });

  test("relayout after a text change keeps the popup centered on its old center", () => {
    const popup = messagePopup();
    const label = popup.children[0];
    assert.ok(label instanceof Label);
    label.update("hello\nworld");
    assert.equal(popup.needsLayout, true);

    popup.draw(new RecordingBackend());
    assert.equal(popup.needsLayout, false);
    assert.equal(popup.height, 181);
    assert.equal(popup.y, 209);
  });

  test("addCloseButton appends a finishing button", () => {
    const popup = createTestPopup();
    popup.updateLayout(REGION);
    const done = popup.addCloseButton("Done");
    assert.equal(popup.children.at(-1), done);
    done.click();
    assert.equal(popup.finished, true);
  });

  test("preventClose changes mark the layout dirty", () => {
    const popup = messagePopup();
    popup.preventClose = true;
    assert.equal(popup.needsLayout, true);
  });

  test("moveTo keeps the popup inside the region", () => {
    const popup = messagePopup();
    popup.moveTo(-50, 1000);
    assert.deepEqual([popup.x, popup.y], [0, 446]);
  });
});

describe("Popup scrolling layout", () => {
  test("caps the height and scrolls the overflow", () => {
    const popup = longPopup();
    assert.equal(popup.isScrollable, true);
    assert.equal(popup.height, 450);
    assert.equal(popup.y, 75);
    assert.equal(popup.visibleContentHeight, 405);
    assert.equal(popup.contentHeight, 812);
    assert.equal(popup.maxScroll, 407);
    assert.equal(popup.children[0]?.width, 344);
  });

  test("places the scrollbar beside the content below the title bar", () => {
    const bar = longPopup().scrollbar;
    assert.ok(bar);
    assert.deepEqual([bar.x, bar.y, bar.width, bar.height], [384, 45, 16, 405]);
    assert.deepEqual([bar.globalX, bar.globalY], [584, 120]);
    assert.equal(bar.maxScroll, 407);
  });

  test("scrollTo clamps and shifts content without relayout", () => {
    const popup = longPopup();
    popup.scrollTo(1000);
    assert.equal(popup.scrollOffset, 407);
    assert.equal(popup.scrollbar?.scrollOffset, 407);
    assert.equal(popup.children[0]?.globalY, -277);
    popup.scrollTo(-5);
    assert.equal(popup.scrollOffset, 0);
  });

  test("scrollTo is ignored when nothing overflows", () => {
    const popup = messagePopup();
    popup.scrollTo(50);
    assert.equal(popup.scrollOffset, 0);
  });

  test("drops the scrollbar once the content fits again", () => {
    const popup = longPopup();
    for (const child of popup.children.slice(0, 15)) popup.removeChild(child);
    popup.layoutChildren();
    assert.equal(popup.isScrollable, false);
    assert.equal(popup.scrollbar, null);
    assert.equal(popup.maxScroll, 0);
  });

  test("a button added later takes part in the next layout", () => {
    const popup = messagePopup();
    popup.addChild(new Button("Later"));
    popup.layoutChildren();
    assert.equal(popup.children.at(-1)?.y, 99);
  });
});
