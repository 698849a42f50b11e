/**
 * Core type definitions for the popup swarm
 */

// --- Geometry ---

/** Integer pixel rectangle in desktop coordinates. */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Bounding rectangle of one display. Fixed for a popup once chosen. */
export type Monitor = Readonly<Rectangle>;

export interface Size {
  width: number;
  height: number;
}

// --- Placement ---

/**
 * Lowkey anchor: 0 top-left, 1 top-right, 2 bottom-left, 3 bottom-right,
 * 4 picks one of the four at random when the popup is placed.
 */
export type LowkeyCorner = 0 | 1 | 2 | 3 | 4;

export const RANDOM_CORNER: LowkeyCorner = 4;

// --- Lifecycle ---

export type LifecycleState = "created" | "placed" | "active" | "closing" | "closed";

export type CloseReason = "click" | "timeout" | "pump-scare" | "external";

// --- Media ---

/** A piece of pack media shown in a popup. */
export interface PopupMedia {
  path: string;
  packName: string;
  width: number;       // Natural pixel size of the source
  height: number;
  clicksToClose: number;
}

/** Text the pack supplies for one popup. */
export interface PopupContent {
  caption: string | null;
  denialText: string;
  closeLabel: string;
}

// --- Records ---

/**
 * Live state of one popup. Owned by its lifecycle controller; the registry
 * and the window only hold references.
 */
export interface PopupRecord {
  id: number;                       // Assigned by the registry, 0 until registered
  rectangle: Rectangle | null;      // null until placed
  monitor: Monitor | null;
  clicksRemaining: number;
  readonly denialActive: boolean;
  opacity: number;                  // 0-1
  state: LifecycleState;
}
