import { assert, describe, test } from "@popframe/testkit";
import { RecordingBackend } from "../../testing/recordingBackend.js";
import { fallbackPalette } from "../../theme/palette.js";
import { createTestPopup } from "./harness.js";

const REGION = { width: 800, height: 600 };
const p = fallbackPalette;

describe("Popup draw", () => {
  test("draws frame, title and children in order", () => {
    const popup = createTestPopup("Notice", { popup: { message: "hello" } });
    popup.updateLayout(REGION);
    const backend = new RecordingBackend();
    popup.draw(backend);

    assert.deepEqual(backend.ops, [
      { kind: "rect", x: 200, y: 223, w: 400, h: 154, color: p.popupBackground },
      { kind: "border", x: 200, y: 223, w: 400, h: 154, color: p.popupBorder, thickness: 1 },
      { kind: "rect", x: 200, y: 223, w: 400, h: 45, color: p.titleBar },
      { kind: "text", text: "Notice", x: 220, y: 236, fontSize: 18, color: p.titleText },
      { kind: "text", text: "hello", x: 220, y: 278, fontSize: 18, color: p.text },
      { kind: "rect", x: 220, y: 315, w: 360, h: 42, color: p.buttonFill },
      { kind: "text", text: "OK", x: 390, y: 327, fontSize: 18, color: p.buttonText },
    ]);
  });

  test("an empty title draws no title text", () => {
    const popup = createTestPopup("", { popup: { message: "hello" } });
    popup.updateLayout(REGION);
    const backend = new RecordingBackend();
    popup.draw(backend);
    assert.deepEqual(
      backend.texts().map((t) => t.text),
      ["hello", "OK"],
    );
  });

  test("scrolling content is clipped below the title and beside the scrollbar", () => {
    const popup = createTestPopup("Log");
    for (let i = 0; i < 20; i++) popup.add.label(`line ${i}`);
    popup.updateLayout(REGION);
    const backend = new RecordingBackend();
    popup.draw(backend);

    const clipIndex = backend.ops.findIndex((op) => op.kind === "pushClip");
    const popIndex = backend.ops.findIndex((op) => op.kind === "popClip");
    assert.deepEqual(backend.ops[clipIndex], { kind: "pushClip", x: 220, y: 120, w: 344, h: 405 });
    assert.equal(backend.ops.filter((op) => op.kind === "text").length, 22);
    assert.equal(backend.findText("line 0")?.y, 130);
    assert.deepEqual(backend.ops[popIndex + 1], {
      kind: "rect",
      x: 584,
      y: 120,
      w: 16,
      h: 405,
      color: p.scrollTrack,
    });
    assert.equal(backend.ops.at(-1)?.kind, "rect");
    assert.equal(backend.maxClipDepth, 1);
    assert.equal(backend.openClips, 0);
  });
});
