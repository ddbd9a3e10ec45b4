import type { HostRegion } from "../host.js";
import type { PopupHost } from "../manager/popupManager.js";
import type { Popup } from "../widgets/popup.js";

export type FakeHostOptions = Readonly<{
  /** `null` simulates a host with nothing drawable. */
  region?: HostRegion | null;
}>;

/** In-process PopupHost that records modal requests. */
export class FakeHost implements PopupHost {
  region: HostRegion | null;
  readonly modalRequests: Popup[] = [];
  readonly releases: Popup[] = [];

  constructor(opts: FakeHostOptions = {}) {
    this.region = opts.region === undefined ? { width: 800, height: 600 } : opts.region;
  }

  resolveRegion(): HostRegion | null {
    return this.region;
  }

  requestModal(popup: Popup): void {
    this.modalRequests.push(popup);
  }

  releaseModal(popup: Popup): void {
    this.releases.push(popup);
  }
}
