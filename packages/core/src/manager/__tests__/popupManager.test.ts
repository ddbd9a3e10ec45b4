import { assert, describe, test } from "@popframe/testkit";
import {
  TestEventBuilder,
  keyDown,
  mouseDown,
  mouseMove,
  wheel,
} from "../../testing/events.js";
import { FakeHost } from "../../testing/fakeHost.js";
import { RecordingBackend } from "../../testing/recordingBackend.js";
import type { Popup } from "../../widgets/popup.js";
import { captureLogger, createTestPopup } from "../../widgets/__tests__/harness.js";
import { PopupManager } from "../popupManager.js";

function popup(title: string, options: { blocking?: boolean } = {}): Popup {
  return createTestPopup(title, { popup: { message: "hello", ...options } });
}

function setup(): { host: FakeHost; manager: PopupManager; log: ReturnType<typeof captureLogger> } {
  const host = new FakeHost();
  const log = captureLogger();
  return { host, manager: new PopupManager(host, { logger: log }), log };
}

describe("PopupManager sessions", () => {
  test("show activates when idle and queues otherwise", () => {
    const { host, manager } = setup();
    const a = popup("A");
    const b = popup("B");

    assert.deepEqual(manager.show(a), { ok: true, status: "active" });
    assert.equal(manager.active, a);
    assert.equal(a.shown, true);
    assert.equal(a.y, 223);
    assert.deepEqual(host.modalRequests, [a]);

    assert.deepEqual(manager.show(b), { ok: true, status: "queued" });
    assert.equal(b.shown, false);
    assert.equal(manager.queueLength, 1);
  });

  test("showing the same popup twice changes nothing", () => {
    const { host, manager } = setup();
    const a = popup("A");
    const b = popup("B");
    manager.show(a);
    manager.show(b);
    assert.deepEqual(manager.show(a), { ok: true, status: "active" });
    assert.deepEqual(manager.show(b), { ok: true, status: "queued" });
    assert.equal(manager.queueLength, 1);
    assert.equal(host.modalRequests.length, 1);
  });

  test("closing activates queued popups in FIFO order", () => {
    const { host, manager } = setup();
    const [a, b, c] = [popup("A"), popup("B"), popup("C")];
    manager.show(a);
    manager.show(b);
    manager.show(c);

    assert.equal(manager.closeActive(), a);
    assert.equal(a.finished, true);
    assert.equal(manager.active, b);
    assert.equal(manager.closeActive("cancelled"), b);
    assert.equal(b.cancelled, true);
    assert.equal(manager.active, c);
    manager.closeActive();
    assert.equal(manager.active, null);
    assert.equal(manager.closeActive(), null);

    assert.deepEqual(host.releases, [a, b, c]);
    assert.deepEqual(host.modalRequests, [a, b, c]);
  });

  test("queueNext jumps the queue and shows at once when idle", () => {
    const { manager } = setup();
    const [a, b, c] = [popup("A"), popup("B"), popup("C")];
    assert.deepEqual(manager.queueNext(a), { ok: true, status: "active" });
    manager.show(b);
    manager.show(c);
    assert.deepEqual(manager.queueNext(c), { ok: true, status: "queued" });
    assert.deepEqual(manager.queued, [c, b]);
  });

  test("poll ends sessions whose popup closed itself", () => {
    const { manager } = setup();
    const [a, b] = [popup("A"), popup("B")];
    manager.show(a);
    manager.show(b);
    assert.equal(manager.poll(), false);
    a.cancelled = true;
    assert.equal(manager.poll(), true);
    assert.equal(manager.active, b);
    assert.equal(manager.poll(), false);
  });
});

describe("PopupManager host failures", () => {
  test("no drawable region reports an error and shows nothing", () => {
    const host = new FakeHost({ region: null });
    const manager = new PopupManager(host, { logger: captureLogger() });
    const a = popup("A");
    const result = manager.show(a);
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error.code, "POPUP_HOST_UNAVAILABLE");
    assert.equal(a.shown, false);
    assert.equal(manager.active, null);
    assert.equal(host.modalRequests.length, 0);
  });

  test("queued popups that cannot be shown are logged and skipped", () => {
    const { host, manager, log } = setup();
    const [a, b] = [popup("A"), popup("B")];
    manager.show(a);
    manager.show(b);
    host.region = null;
    manager.closeActive();
    assert.equal(manager.active, null);
    assert.equal(manager.queueLength, 0);
    assert.deepEqual(log.lines.error, [
      '[popframe][manager] queued popup "B" not shown: PopupUiError: no drawable region for popup',
    ]);
  });
});

describe("PopupManager event routing", () => {
  test("everything passes through when idle", () => {
    const { manager } = setup();
    assert.equal(manager.handleEvent(keyDown("enter")), "passThrough");
  });

  test("a click on OK ends the session and is consumed", () => {
    const { host, manager } = setup();
    const a = popup("A");
    manager.show(a);
    const outcomes = new TestEventBuilder()
      .move(300, 330)
      .click(300, 330)
      .build()
      .map((event) => manager.handleEvent(event));
    assert.deepEqual(outcomes, ["passThrough", "consumed", "consumed"]);
    assert.equal(manager.active, null);
    assert.deepEqual(host.releases, [a]);
  });

  test("keys never reach the host while a popup is active", () => {
    const { manager } = setup();
    manager.show(popup("A"));
    assert.equal(manager.handleEvent(keyDown("tab")), "consumed");
    assert.equal(manager.handleEvent(keyDown("escape")), "consumed");
    assert.equal(manager.active, null);
  });

  test("blocking popups swallow clicks outside", () => {
    const { manager } = setup();
    manager.show(popup("A", { blocking: true }));
    assert.equal(manager.handleEvent(mouseDown(10, 10)), "consumed");
    assert.equal(manager.handleEvent(wheel(10, 10, 1)), "consumed");
    assert.equal(manager.handleEvent(mouseMove(10, 10)), "passThrough");
  });

  test("popups are non-blocking unless asked, so wheel input reaches the host", () => {
    const { manager } = setup();
    const a = popup("A");
    manager.show(a);
    assert.equal(a.blocking, false);
    assert.equal(manager.handleEvent(wheel(5, 5, 1)), "passThrough");
  });

  test("non-blocking popups let unclaimed input outside reach the host", () => {
    const { manager } = setup();
    manager.show(popup("A", { blocking: false }));
    assert.equal(manager.handleEvent(mouseDown(10, 10)), "passThrough");
    assert.equal(manager.handleEvent(mouseDown(10, 10, "right")), "passThrough");
    assert.equal(manager.handleEvent(mouseDown(10, 10, "middle")), "passThrough");
    assert.equal(manager.handleEvent(wheel(300, 300, 1)), "passThrough");
    assert.equal(manager.handleEvent(mouseDown(205, 300)), "consumed");
  });
});

describe("PopupManager draw", () => {
  test("draw polls first so a closed popup is replaced in the same frame", () => {
    const { manager } = setup();
    const [a, b] = [popup("A"), popup("B")];
    manager.show(a);
    manager.show(b);
    a.finished = true;

    const backend = new RecordingBackend();
    manager.draw(backend);
    assert.equal(manager.active, b);
    assert.notEqual(backend.findText("B"), null);
    assert.equal(backend.findText("A"), null);
  });
});
