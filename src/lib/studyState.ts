import type { Session } from './content';
import {
  breakReminderMessage,
  checkBreakTimer,
  restartBreakTimer,
  startBreakTimer,
  timerStartedMessage,
  type BreakTimer,
} from './breakTimer';
import { initSelection, selectSession, selectTopic, toggleCompletion, type SelectionState } from './selection';

export type StudyNotice = {
  /** Increments per notice so the toast layer can tell repeats apart. */
  id: number;
  kind: 'info' | 'break';
  message: string;
};

export type StudyState = SelectionState & {
  timer: BreakTimer;
  notice: StudyNotice | null;
  /** Last notice id handed out. Never reset, so ids stay unique after a dismissal. */
  noticeSeq: number;
  /** Clock reading of the last interaction; the countdown display is computed against it. */
  clock: number;
};

export type StudyEvent =
  | { type: 'select-session'; title: string; now: number }
  | { type: 'select-topic'; title: string; now: number }
  | { type: 'toggle-completion'; topicId: string; value: boolean; now: number }
  | { type: 'reset-timer'; now: number }
  | { type: 'acknowledge-reminder'; now: number }
  | { type: 'check-timer'; now: number }
  | { type: 'set-threshold'; thresholdMs: number; now: number }
  | { type: 'dismiss-notice'; id: number; now: number };

export type BreakReminder = { due: boolean; message: string };

function withNotice(s: StudyState, kind: StudyNotice['kind'], message: string): StudyState {
  const id = s.noticeSeq + 1;
  return { ...s, noticeSeq: id, notice: { id, kind, message } };
}

export function initStudyState(sessions: Session[], now: number, thresholdMs?: number): StudyState {
  return { ...initSelection(sessions), timer: startBreakTimer(now, thresholdMs), notice: null, noticeSeq: 0, clock: now };
}

function applyEvent(s: StudyState, e: StudyEvent): StudyState {
  switch (e.type) {
    case 'select-session':
      return { ...s, ...selectSession(s, e.title) };
    case 'select-topic':
      return { ...s, ...selectTopic(s, e.title) };
    case 'toggle-completion':
      return { ...s, ...toggleCompletion(s, e.topicId, e.value) };
    case 'reset-timer': {
      const timer = restartBreakTimer(s.timer, e.now);
      return withNotice({ ...s, timer }, 'info', timerStartedMessage(timer.thresholdMs));
    }
    case 'acknowledge-reminder':
      if (!s.timer.pending) return s;
      return { ...s, timer: restartBreakTimer(s.timer, e.now) };
    case 'check-timer':
      return s;
    case 'set-threshold':
      if (s.timer.thresholdMs === e.thresholdMs) return s;
      return { ...s, timer: { ...s.timer, thresholdMs: e.thresholdMs } };
    case 'dismiss-notice':
      if (s.notice?.id !== e.id) return s;
      return { ...s, notice: null };
  }
}

/**
 * Applies one interaction and then checks the break timer against the same
 * clock reading. The timer is only ever evaluated here, once per interaction.
 */
export function update(s: StudyState, e: StudyEvent): StudyState {
  const next = { ...applyEvent(s, e), clock: e.now };
  const { timer, fired } = checkBreakTimer(next.timer, e.now);
  if (!fired) return next;
  return withNotice({ ...next, timer }, 'break', breakReminderMessage(timer.thresholdMs));
}

export function breakReminder(s: StudyState): BreakReminder {
  return { due: s.timer.pending, message: breakReminderMessage(s.timer.thresholdMs) };
}
