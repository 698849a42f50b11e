import { z } from "zod";
import type { LowkeyCorner } from "../types";

export interface PopupSettings {
  // Placement
  lowkeyMode: boolean;
  lowkeyCorner: LowkeyCorner;   // 4 = random corner

  // Movement
  movingChance: number;         // Percent 0-100
  movingSpeed: number;          // Max pixels per step on each axis

  // Timeout
  timeoutEnabled: boolean;
  timeout: number;              // Milliseconds before the fade starts

  // Interaction
  multiClickPopups: boolean;
  buttonless: boolean;
  clickthroughEnabled: boolean;
  panicKey: string;             // KeyboardEvent.key

  // Appearance
  opacity: number;              // 0-1
  denialChance: number;         // Percent 0-100
  captionsInPopups: boolean;

  // Close side effects
  mitosisMode: boolean;
  mitosisStrength: number;      // Popups spawned per mitosis
  webOnPopupClose: boolean;
  webChance: number;            // Percent 0-100
}

export const DEFAULT_POPUP_SETTINGS: PopupSettings = {
  lowkeyMode: false,
  lowkeyCorner: 0,

  movingChance: 0,
  movingSpeed: 5,

  timeoutEnabled: false,
  timeout: 15000,

  multiClickPopups: false,
  buttonless: false,
  clickthroughEnabled: false,
  panicKey: "Escape",

  opacity: 1,
  denialChance: 0,
  captionsInPopups: true,

  mitosisMode: false,
  mitosisStrength: 2,
  webOnPopupClose: false,
  webChance: 0,
};

const percent = z.number().min(0).max(100);

// Longest delay setTimeout honours; larger values fire immediately
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Per-field validators. Each field is checked on its own so one bad value
 * only falls back that field to its default.
 */
export const popupSettingsSchema = z.object({
  lowkeyMode: z.boolean(),
  lowkeyCorner: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
  movingChance: percent,
  movingSpeed: z.number().int().min(1),
  timeoutEnabled: z.boolean(),
  timeout: z.number().int().min(0).max(MAX_TIMER_DELAY_MS),
  multiClickPopups: z.boolean(),
  buttonless: z.boolean(),
  clickthroughEnabled: z.boolean(),
  panicKey: z.string().min(1),
  opacity: z.number().min(0).max(1),
  denialChance: percent,
  captionsInPopups: z.boolean(),
  mitosisMode: z.boolean(),
  mitosisStrength: z.number().int().min(0),
  webOnPopupClose: z.boolean(),
  webChance: percent,
});

type SettingsKey = keyof PopupSettings;

function isSettingsKey(key: string): key is SettingsKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_POPUP_SETTINGS, key);
}

/**
 * Merge loaded data with defaults, ensuring all fields exist and hold
 * valid values. Unknown keys are dropped; invalid values keep the default.
 */
export function mergeSettings(loaded: Record<string, unknown> | null): PopupSettings {
  const merged: PopupSettings = { ...DEFAULT_POPUP_SETTINGS };
  if (!loaded) return merged;

  const shape = popupSettingsSchema.shape;
  const candidate: Partial<Record<SettingsKey, unknown>> = {};
  for (const [key, value] of Object.entries(loaded)) {
    if (!isSettingsKey(key)) continue;
    const result = shape[key].safeParse(value);
    if (result.success) {
      candidate[key] = result.data;
    } else {
      console.warn(`[PopupSettings] ignoring invalid ${key}: ${result.error.issues[0]?.message ?? "invalid value"}`);
    }
  }

  return popupSettingsSchema.parse({ ...merged, ...candidate });
}
