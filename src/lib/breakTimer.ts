export const DEFAULT_BREAK_MINUTES = 2;

export type BreakTimer = {
  /** Epoch ms of the last (re)start. */
  startedAt: number;
  /** Threshold reached and the reminder not yet acknowledged. */
  pending: boolean;
  thresholdMs: number;
};

export type BreakCheck = {
  timer: BreakTimer;
  /** True only on the check that moved Running → Pending. */
  fired: boolean;
};

export function minutesToMs(minutes: number): number {
  return Math.round(minutes * 60_000);
}

export function startBreakTimer(now: number, thresholdMs = minutesToMs(DEFAULT_BREAK_MINUTES)): BreakTimer {
  return { startedAt: now, pending: false, thresholdMs };
}

export function elapsedMs(t: BreakTimer, now: number): number {
  return Math.max(0, now - t.startedAt);
}

export function checkBreakTimer(t: BreakTimer, now: number): BreakCheck {
  if (t.pending) return { timer: t, fired: false };
  if (elapsedMs(t, now) < t.thresholdMs) return { timer: t, fired: false };
  return { timer: { ...t, pending: true }, fired: true };
}

/** Pending → Running. Reset and "reminder shown" both land here. */
export function restartBreakTimer(t: BreakTimer, now: number): BreakTimer {
  return { ...t, startedAt: now, pending: false };
}

export function timeRemainingMs(t: BreakTimer, now: number): number {
  return Math.max(0, t.thresholdMs - elapsedMs(t, now));
}

/** 0..1 */
export function breakProgress(t: BreakTimer, now: number): number {
  if (t.thresholdMs <= 0) return 1;
  return Math.min(1, elapsedMs(t, now) / t.thresholdMs);
}

/** m:ss, rounding partial seconds up so the display reaches 0:00 exactly at the threshold. */
export function formatClock(ms: number): string {
  const total = Math.max(0, Math.ceil(ms / 1000));
  const m = Math.floor(total / 60);
  const s = String(total % 60).padStart(2, '0');
  return `${m}:${s}`;
}

function minutesLabel(thresholdMs: number): string {
  const minutes = Math.round(thresholdMs / 60_000);
  return minutes === 1 ? '1 minute' : `${minutes} minutes`;
}

export function breakReminderMessage(thresholdMs: number): string {
  return `Time for a break! You have been studying for ${minutesLabel(thresholdMs)}.`;
}

export function timerStartedMessage(thresholdMs: number): string {
  return `Timer started! We'll remind you to take a break in ${minutesLabel(thresholdMs)}.`;
}
