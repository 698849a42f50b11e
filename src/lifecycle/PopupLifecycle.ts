import type { CloseReason, LifecycleState, PopupMedia, PopupRecord, Rectangle } from "../types";
import type { PopupSettings } from "../settings/PopupSettings";
import type { PopupRegistry } from "../registry/PopupRegistry";
import type { MonitorProvider } from "../placement/MonitorProvider";
import type { PopupWindow } from "../view/PopupWindow";
import type { PopupEffects } from "../effects/PopupEffects";
import type { RandomSource } from "../random/Random";
import { defaultRandom, roll } from "../random/Random";
import { computePopupSize, place } from "../placement/PlacementEngine";
import { WindowDestroyedError } from "../view/PopupWindow";
import { runAfter, runEvery } from "./TimerTask";
import { MOVE_INTERVAL_MS, pickVelocity, stepMovement } from "./Movement";
import { FADE_INTERVAL_MS, nextOpacity } from "./Fade";

/** Delay before a pump-scare popup closes itself. */
export const PUMP_SCARE_CLOSE_MS = 2500;

export interface PopupLifecycleOptions {
  registry: PopupRegistry;
  monitors: MonitorProvider;
  window: PopupWindow;
  settings: PopupSettings;
  media: PopupMedia;
  effects: PopupEffects;
  /** Forces a fast uniform close instead of the configured timeout. */
  pumpScare?: boolean;
  rng?: RandomSource;
  onClose?: () => void;
}

export interface ClickModifiers {
  altHeld: boolean;
}

/**
 * Drives one popup from placement to teardown.
 *
 * Movement and fade run as timer tasks tied to an AbortSignal that close()
 * aborts, so none of them survives the popup. A window destroyed under a
 * running task is the expected race and ends that task quietly.
 */
export class PopupLifecycle {
  readonly record: PopupRecord;

  private registry: PopupRegistry;
  private monitors: MonitorProvider;
  private window: PopupWindow;
  private settings: PopupSettings;
  private media: PopupMedia;
  private effects: PopupEffects;
  private pumpScare: boolean;
  private rng: RandomSource;
  private onClose: (() => void) | null;
  private abort = new AbortController();
  private moving = false;
  private fading = false;

  constructor(options: PopupLifecycleOptions) {
    this.registry = options.registry;
    this.monitors = options.monitors;
    this.window = options.window;
    this.settings = options.settings;
    this.media = options.media;
    this.effects = options.effects;
    this.pumpScare = options.pumpScare ?? false;
    this.rng = options.rng ?? defaultRandom;
    this.onClose = options.onClose ?? null;

    this.record = {
      id: 0,
      rectangle: null,
      monitor: null,
      clicksRemaining: 1,
      denialActive: roll(this.rng, this.settings.denialChance),
      opacity: this.settings.opacity,
      state: "created",
    };
  }

  get state(): LifecycleState {
    return this.record.state;
  }

  get isMoving(): boolean {
    return this.moving;
  }

  get isFading(): boolean {
    return this.fading;
  }

  /**
   * Register, place and activate the popup. Only the first call has any
   * effect.
   */
  start(): Rectangle | null {
    if (this.record.state !== "created") return this.record.rectangle;

    // Counted before placement so the new popup sees itself as present
    this.registry.register(this.record);

    const monitor = this.monitors.pickMonitor();
    const size = computePopupSize(
      { width: this.media.width, height: this.media.height },
      monitor,
      this.settings.lowkeyMode,
      this.rng,
    );
    const rect = place(
      {
        size,
        monitor,
        siblings: this.registry.siblingRectangles(this.record),
        popupIndex: this.registry.count(),
        lowkeyMode: this.settings.lowkeyMode,
        lowkeyCorner: this.settings.lowkeyCorner,
      },
      this.rng,
    );

    this.record.monitor = monitor;
    this.record.rectangle = rect;
    this.window.setGeometry(rect);
    this.window.setOpacity(this.record.opacity);
    this.record.state = "placed";

    this.record.clicksRemaining = this.settings.multiClickPopups
      ? Math.max(1, Math.floor(this.media.clicksToClose))
      : 1;
    this.record.state = "active";

    this.tryMove();
    this.tryTimeout();
    this.tryPumpScare();
    return rect;
  }

  /**
   * Count one click. Closes when the remaining count reaches zero; with
   * alt held the media is blacklisted first.
   */
  onClick(modifiers: ClickModifiers = { altHeld: false }): void {
    if (this.record.state !== "active") return;

    this.record.clicksRemaining -= 1;
    if (this.record.clicksRemaining > 0) return;

    if (modifiers.altHeld) {
      this.runEffect("blacklist", () => this.effects.blacklist(this.media));
    }
    this.close("click");
  }

  /**
   * Tear the popup down. Safe to call any number of times; only the first
   * call does anything.
   */
  close(reason: CloseReason = "external"): void {
    const state = this.record.state;
    if (state === "closing" || state === "closed") return;
    this.record.state = "closing";

    this.abort.abort();
    this.moving = false;
    this.fading = false;
    this.registry.unregister(this.record);

    if (reason === "click") this.tryMitosis();
    this.tryWebOpen();

    this.window.destroy();
    this.record.state = "closed";

    const onClose = this.onClose;
    this.onClose = null;
    if (onClose) onClose();
  }

  private tryMove(): void {
    if (!roll(this.rng, this.settings.movingChance)) return;

    const monitor = this.record.monitor;
    let velocity = pickVelocity(this.rng, this.settings.movingSpeed);
    if (!monitor || !velocity) return;

    this.moving = true;
    runEvery(
      MOVE_INTERVAL_MS,
      () => {
        const rect = this.record.rectangle;
        if (!rect || !velocity) return false;

        const next = stepMovement(rect, velocity, monitor);
        velocity = next.velocity;
        this.record.rectangle = next.rect;
        const ok = this.applyToWindow("move", () => this.window.setGeometry(next.rect));
        if (!ok) this.moving = false;
        return ok;
      },
      this.abort.signal,
    );
  }

  private tryTimeout(): void {
    if (!this.settings.timeoutEnabled || this.pumpScare) return;

    runEvery(
      FADE_INTERVAL_MS,
      () => {
        this.fading = true;
        const opacity = nextOpacity(this.record.opacity);
        this.record.opacity = opacity;
        if (!this.applyToWindow("fade", () => this.window.setOpacity(opacity))) {
          this.fading = false;
          return false;
        }
        if (opacity > 0) return true;

        this.fading = false;
        this.close("timeout");
        return false;
      },
      this.abort.signal,
      this.settings.timeout,
    );
  }

  private tryPumpScare(): void {
    if (!this.pumpScare) return;
    runAfter(PUMP_SCARE_CLOSE_MS, () => this.close("pump-scare"), this.abort.signal);
  }

  private tryMitosis(): void {
    if (!this.settings.mitosisMode || this.settings.lowkeyMode) return;
    for (let n = 0; n < this.settings.mitosisStrength; n++) {
      this.runEffect("mitosis", () => this.effects.spawnPopup());
    }
  }

  private tryWebOpen(): void {
    if (!this.settings.webOnPopupClose) return;
    if (roll(this.rng, (100 - this.settings.webChance) / 2)) {
      this.runEffect("web open", () => this.effects.openWeb());
    }
  }

  /**
   * Apply a change to the window from a timer task. Returns false when the
   * task should stop.
   */
  private applyToWindow(task: string, apply: () => void): boolean {
    try {
      apply();
      return true;
    } catch (e) {
      if (!(e instanceof WindowDestroyedError)) {
        console.warn(`[PopupLifecycle] ${task} stopped for popup ${this.record.id}:`, e);
      }
      return false;
    }
  }

  private runEffect(name: string, effect: () => void | Promise<void>): void {
    const report = (e: unknown): void => {
      console.warn(`[PopupLifecycle] ${name} failed for popup ${this.record.id}:`, e);
    };
    try {
      void Promise.resolve(effect()).catch(report);
    } catch (e) {
      report(e);
    }
  }
}
