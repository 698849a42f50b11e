export * from "./types";
export { PopupSwarm } from "./PopupSwarm";
export type { ContentSource, PopupSwarmOptions, SpawnOptions } from "./PopupSwarm";
export { PopupRegistry } from "./registry/PopupRegistry";
export { PopupLifecycle, PUMP_SCARE_CLOSE_MS } from "./lifecycle/PopupLifecycle";
export type { ClickModifiers, PopupLifecycleOptions } from "./lifecycle/PopupLifecycle";
export {
  place,
  placeLowkey,
  computeCells,
  computePopupSize,
  siblingWeight,
  GRID_CELL_SIDE,
  OVERLAP_BIAS,
} from "./placement/PlacementEngine";
export type { PlacementCell, PlacementOptions, PlacementRequest } from "./placement/PlacementEngine";
export { RandomMonitorProvider } from "./placement/MonitorProvider";
export type { MonitorProvider } from "./placement/MonitorProvider";
export { DomPopupWindow } from "./view/DomPopupWindow";
export { WindowDestroyedError } from "./view/PopupWindow";
export type { PopupWindow } from "./view/PopupWindow";
export { MediaBlacklist, blacklistDirFor } from "./effects/MediaBlacklist";
export type { Notifier, DesktopNotification } from "./effects/MediaBlacklist";
export type { PopupEffects } from "./effects/PopupEffects";
export { DEFAULT_POPUP_SETTINGS, mergeSettings } from "./settings/PopupSettings";
export type { PopupSettings } from "./settings/PopupSettings";
export { createSeededRandom, defaultRandom } from "./random/Random";
export type { RandomSource } from "./random/Random";
