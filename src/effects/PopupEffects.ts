import type { PopupMedia } from "../types";

/**
 * Side effects a popup triggers when it closes. None of them report back
 * to the popup; failures are the collaborator's to surface.
 */
export interface PopupEffects {
  /** Move the media out of rotation. May complete asynchronously. */
  blacklist(media: PopupMedia): void | Promise<void>;
  /** Open another popup (mitosis). */
  spawnPopup(): void;
  /** Open a web link from the pack. */
  openWeb(): void;
}
