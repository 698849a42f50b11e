import type { PopupContent, PopupMedia } from "./types";
import type { PopupSettings } from "./settings/PopupSettings";
import type { MonitorProvider } from "./placement/MonitorProvider";
import type { RandomSource } from "./random/Random";
import { defaultRandom } from "./random/Random";
import { PopupRegistry } from "./registry/PopupRegistry";
import { PopupLifecycle } from "./lifecycle/PopupLifecycle";
import { DomPopupWindow } from "./view/DomPopupWindow";

/**
 * Pack media and text for new popups. Media selection lives with the host.
 */
export interface ContentSource {
  /** Next media to show, or null when the pack has nothing left. */
  nextMedia(): PopupMedia | null;
  contentFor(media: PopupMedia): PopupContent;
}

export interface PopupSwarmOptions {
  container: HTMLElement;
  settings: PopupSettings;
  monitors: MonitorProvider;
  content: ContentSource;
  blacklist?: (media: PopupMedia) => void | Promise<void>;
  openWeb?: () => void;
  onPanic?: () => void;
  /** Read when each popup is created. */
  isPumpScare?: () => boolean;
  rng?: RandomSource;
}

export interface SpawnOptions {
  media?: PopupMedia;
  onClose?: () => void;
}

/**
 * Owns the registry and opens popups into a DOM container.
 */
export class PopupSwarm {
  readonly registry = new PopupRegistry();
  private options: PopupSwarmOptions;
  private lifecycles = new Set<PopupLifecycle>();

  constructor(options: PopupSwarmOptions) {
    this.options = options;
  }

  get liveCount(): number {
    return this.registry.count();
  }

  /**
   * Open one popup. Returns null when there is no media to show.
   */
  spawn(spawnOptions: SpawnOptions = {}): PopupLifecycle | null {
    const { settings, content } = this.options;
    const media = spawnOptions.media ?? content.nextMedia();
    if (!media) return null;

    const win = new DomPopupWindow(this.options.container, settings);
    const lifecycle = new PopupLifecycle({
      registry: this.registry,
      monitors: this.options.monitors,
      window: win,
      settings,
      media,
      effects: {
        blacklist: (m) => this.options.blacklist?.(m),
        spawnPopup: () => {
          this.spawn();
        },
        openWeb: () => this.options.openWeb?.(),
      },
      pumpScare: this.options.isPumpScare?.() ?? false,
      rng: this.options.rng ?? defaultRandom,
      onClose: () => {
        this.lifecycles.delete(lifecycle);
        spawnOptions.onClose?.();
      },
    });

    win.bind(
      {
        onClick: (modifiers) => lifecycle.onClick(modifiers),
        onPanic: this.options.onPanic,
      },
      content.contentFor(media),
      lifecycle.record.denialActive,
    );

    this.lifecycles.add(lifecycle);
    lifecycle.start();
    return lifecycle;
  }

  /** Close every live popup. */
  closeAll(): void {
    for (const lifecycle of Array.from(this.lifecycles)) {
      lifecycle.close("external");
    }
  }
}
