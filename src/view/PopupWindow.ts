import type { Rectangle } from "../types";

/**
 * Raised by a window that has already been destroyed. Behaviors that were
 * mid-step when a popup closed see this and stop quietly.
 */
export class WindowDestroyedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: popup window was destroyed`);
    this.name = "WindowDestroyedError";
  }
}

/**
 * Rendering surface for one popup.
 */
export interface PopupWindow {
  readonly isDestroyed: boolean;
  /** Throws WindowDestroyedError after destroy(). */
  setGeometry(rect: Rectangle): void;
  /** Throws WindowDestroyedError after destroy(). */
  setOpacity(value: number): void;
  /** Idempotent. */
  destroy(): void;
}
