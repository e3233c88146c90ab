import { DEFAULT_BREAK_MINUTES } from './breakTimer';

export type Settings = {
  version: 1;
  /** Study minutes before the break reminder. */
  breakMinutes: number; // 1..120
  /** Confetti burst alongside the break reminder. */
  celebrate: boolean;
};

const KEY = 'study_hub_settings_v1';

export const BREAK_MINUTES_MIN = 1;
export const BREAK_MINUTES_MAX = 120;

export function defaultSettings(): Settings {
  return { version: 1, breakMinutes: DEFAULT_BREAK_MINUTES, celebrate: true };
}

export function clampBreakMinutes(n: number): number {
  if (!Number.isFinite(n)) return DEFAULT_BREAK_MINUTES;
  return Math.max(BREAK_MINUTES_MIN, Math.min(BREAK_MINUTES_MAX, Math.round(n)));
}

/** Minutes typed into a field; blank or non-numeric text keeps `fallback`. */
export function parseBreakMinutes(text: string, fallback: number): number {
  const t = text.trim();
  if (!t) return fallback;
  const n = Number(t);
  return Number.isFinite(n) ? clampBreakMinutes(n) : fallback;
}

export function loadSettings(): Settings {
  try {
    const raw = localStorage.getItem(KEY);
    if (!raw) return defaultSettings();
    const parsed = JSON.parse(raw) as Partial<Settings> | null;
    if (parsed?.version !== 1) return defaultSettings();
    return {
      version: 1,
      breakMinutes: clampBreakMinutes(typeof parsed.breakMinutes === 'number' ? parsed.breakMinutes : DEFAULT_BREAK_MINUTES),
      celebrate: typeof parsed.celebrate === 'boolean' ? parsed.celebrate : true,
    };
  } catch {
    return defaultSettings();
  }
}

export const SETTINGS_EVENT = 'study_hub_settings_changed';

export function saveSettings(s: Settings) {
  localStorage.setItem(KEY, JSON.stringify(s));
  // storage events don't fire in the same tab; emit a local event for reactive UIs.
  try {
    window.dispatchEvent(new Event(SETTINGS_EVENT));
  } catch {
    // no-op (tests)
  }
}
