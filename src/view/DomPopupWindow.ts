import type { PopupContent, Rectangle } from "../types";
import type { PopupSettings } from "../settings/PopupSettings";
import type { ClickModifiers } from "../lifecycle/PopupLifecycle";
import type { PopupWindow } from "./PopupWindow";
import { WindowDestroyedError } from "./PopupWindow";

export interface DomPopupHandlers {
  onClick: (modifiers: ClickModifiers) => void;
  onPanic?: () => void;
}

export type DomPopupDisplay = Pick<
  PopupSettings,
  "buttonless" | "clickthroughEnabled" | "captionsInPopups" | "panicKey"
>;

/**
 * Absolutely positioned DOM element acting as one popup window.
 * Forwards clicks and the panic key; everything else is driven from the
 * lifecycle through setGeometry/setOpacity.
 */
export class DomPopupWindow implements PopupWindow {
  readonly el: HTMLDivElement;
  private destroyed = false;
  private handlers: DomPopupHandlers | null = null;
  private display: DomPopupDisplay;

  constructor(container: HTMLElement, display: DomPopupDisplay) {
    this.display = display;
    this.el = document.createElement("div");
    this.el.className = "popup-swarm__popup";
    this.el.tabIndex = -1;
    this.el.style.position = "absolute";
    if (display.clickthroughEnabled) {
      this.el.classList.add("is-clickthrough");
      this.el.style.pointerEvents = "none";
    }
    this.el.addEventListener("keydown", this.handleKeyDown);
    container.appendChild(this.el);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Attach the lifecycle's handlers and render the pack text. Called once,
   * before the lifecycle starts. Takes keyboard focus so the panic key
   * reaches the newest popup.
   */
  bind(handlers: DomPopupHandlers, content: PopupContent, denialActive: boolean): void {
    this.handlers = handlers;

    if (denialActive) {
      const denial = this.el.appendChild(document.createElement("div"));
      denial.className = "popup-swarm__denial";
      denial.textContent = content.denialText;
    }

    if (this.display.captionsInPopups && content.caption) {
      const caption = this.el.appendChild(document.createElement("div"));
      caption.className = "popup-swarm__caption";
      caption.textContent = content.caption;
    }

    if (this.display.buttonless) {
      this.el.addEventListener("click", this.handleClick);
    } else if (!this.display.clickthroughEnabled) {
      const button = this.el.appendChild(document.createElement("button"));
      button.className = "popup-swarm__close";
      button.textContent = content.closeLabel;
      button.addEventListener("click", this.handleClick);
    }

    this.el.focus({ preventScroll: true });
  }

  setGeometry(rect: Rectangle): void {
    if (this.destroyed) throw new WindowDestroyedError("set geometry");
    this.el.style.left = `${rect.x}px`;
    this.el.style.top = `${rect.y}px`;
    this.el.style.width = `${rect.width}px`;
    this.el.style.height = `${rect.height}px`;
  }

  setOpacity(value: number): void {
    if (this.destroyed) throw new WindowDestroyedError("set opacity");
    this.el.style.opacity = String(Math.min(1, Math.max(0, value)));
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.handlers = null;
    this.el.removeEventListener("keydown", this.handleKeyDown);
    this.el.remove();
  }

  private handleClick = (e: MouseEvent): void => {
    e.stopPropagation();
    this.handlers?.onClick({ altHeld: e.altKey });
  };

  private handleKeyDown = (e: KeyboardEvent): void => {
    if (e.key === this.display.panicKey) {
      this.handlers?.onPanic?.();
    }
  };
}
