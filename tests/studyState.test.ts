import test from 'node:test';
import assert from 'node:assert/strict';
import { elapsedMs, timeRemainingMs } from '../src/lib/breakTimer.ts';
import { progress } from '../src/lib/selection.ts';
import { breakReminder, initStudyState, update } from '../src/lib/studyState.ts';
import { makeSessions } from './fixtures.ts';

const T = 120_000;

test('initStudyState selects the first topic and starts the timer', () => {
  const s = initStudyState(makeSessions(), 1_000, T);
  assert.equal(s.sessionId, 'core');
  assert.equal(s.topicId, 'a');
  assert.deepEqual(s.timer, { startedAt: 1_000, pending: false, thresholdMs: T });
  assert.equal(s.notice, null);
  assert.equal(s.clock, 1_000);
});

test('break reminder: one pending transition at 121s, then a fresh episode after acknowledgement', () => {
  let s = initStudyState(makeSessions(), 0, T);
  assert.equal(s.timer.pending, false);
  assert.equal(timeRemainingMs(s.timer, s.clock), 120_000);

  s = update(s, { type: 'check-timer', now: 121_000 });
  assert.equal(s.timer.pending, true);
  assert.deepEqual(s.notice, {
    id: 1,
    kind: 'break',
    message: 'Time for a break! You have been studying for 2 minutes.',
  });
  assert.deepEqual(breakReminder(s), { due: true, message: 'Time for a break! You have been studying for 2 minutes.' });

  s = update(s, { type: 'select-topic', title: 'B', now: 125_000 });
  assert.equal(s.notice?.id, 1);

  s = update(s, { type: 'acknowledge-reminder', now: 126_000 });
  assert.equal(s.timer.pending, false);
  assert.equal(elapsedMs(s.timer, s.clock), 0);
  assert.equal(breakReminder(s).due, false);

  s = update(s, { type: 'check-timer', now: 126_000 + 119_999 });
  assert.equal(s.timer.pending, false);
  assert.equal(s.notice?.id, 1);
});

test('a second break episode gets a fresh notice after the first was dismissed', () => {
  let s = initStudyState(makeSessions(), 0, T);

  s = update(s, { type: 'check-timer', now: 121_000 });
  const first = s.notice?.id;
  assert.equal(first, 1);
  s = update(s, { type: 'acknowledge-reminder', now: 121_000 });
  s = update(s, { type: 'dismiss-notice', id: 1, now: 129_000 });
  assert.equal(s.notice, null);
  assert.equal(s.timer.pending, false);

  s = update(s, { type: 'check-timer', now: 241_001 });
  assert.equal(s.timer.pending, true);
  assert.equal(s.notice?.kind, 'break');
  assert.equal(s.notice?.id, 2);
  assert.notEqual(s.notice?.id, first);
  assert.equal(breakReminder(s).due, true);

  s = update(s, { type: 'acknowledge-reminder', now: 241_001 });
  assert.equal(s.timer.pending, false);
  assert.equal(s.timer.startedAt, 241_001);
  assert.equal(breakReminder(s).due, false);
});

test('notice ids keep counting across dismissals and kinds', () => {
  let s = initStudyState(makeSessions(), 0, T);
  s = update(s, { type: 'reset-timer', now: 1_000 });
  s = update(s, { type: 'dismiss-notice', id: 1, now: 2_000 });
  s = update(s, { type: 'reset-timer', now: 3_000 });
  assert.equal(s.notice?.id, 2);
  assert.equal(s.noticeSeq, 2);
});

test('the timer is checked on every interaction', () => {
  let s = initStudyState(makeSessions(), 0, T);
  s = update(s, { type: 'toggle-completion', topicId: 'a', value: true, now: 130_000 });
  assert.equal(s.completion.core.a, true);
  assert.equal(s.timer.pending, true);
  assert.equal(s.notice?.kind, 'break');
});

test('reset-timer restarts the countdown and posts an info notice', () => {
  let s = initStudyState(makeSessions(), 0, T);
  s = update(s, { type: 'check-timer', now: 200_000 });
  assert.equal(s.timer.pending, true);

  s = update(s, { type: 'reset-timer', now: 210_000 });
  assert.deepEqual(s.timer, { startedAt: 210_000, pending: false, thresholdMs: T });
  assert.deepEqual(s.notice, {
    id: 2,
    kind: 'info',
    message: "Timer started! We'll remind you to take a break in 2 minutes.",
  });
});

test('acknowledging without a pending reminder changes nothing but the clock', () => {
  const s0 = initStudyState(makeSessions(), 0, T);
  const s1 = update(s0, { type: 'acknowledge-reminder', now: 5_000 });
  assert.deepEqual(s1, { ...s0, clock: 5_000 });
});

test('lowering the threshold below the elapsed time fires on the same event', () => {
  let s = initStudyState(makeSessions(), 0, T);
  s = update(s, { type: 'set-threshold', thresholdMs: 60_000, now: 90_000 });
  assert.equal(s.timer.thresholdMs, 60_000);
  assert.equal(s.timer.pending, true);
  assert.equal(s.notice?.message, 'Time for a break! You have been studying for 1 minute.');
});

test('dismiss-notice only clears the notice it names', () => {
  let s = initStudyState(makeSessions(), 0, T);
  s = update(s, { type: 'reset-timer', now: 1_000 });
  assert.equal(s.notice?.id, 1);

  s = update(s, { type: 'dismiss-notice', id: 7, now: 2_000 });
  assert.equal(s.notice?.id, 1);

  s = update(s, { type: 'dismiss-notice', id: 1, now: 3_000 });
  assert.equal(s.notice, null);
});

test('selection events: Core A/B reach 0.5 then 1.0', () => {
  let s = initStudyState(makeSessions(), 0, T);
  s = update(s, { type: 'select-session', title: 'Core', now: 1 });
  s = update(s, { type: 'select-topic', title: 'B', now: 2 });
  s = update(s, { type: 'toggle-completion', topicId: 'b', value: true, now: 3 });
  assert.equal(progress(s, 'core'), 0.5);

  s = update(s, { type: 'toggle-completion', topicId: 'a', value: true, now: 4 });
  assert.equal(progress(s, 'core'), 1);
});

test('unknown session titles fall back to the first session', () => {
  let s = initStudyState(makeSessions(), 0, T);
  s = update(s, { type: 'select-session', title: 'Data', now: 1 });
  s = update(s, { type: 'select-session', title: 'Missing', now: 2 });
  assert.equal(s.sessionId, 'core');
});
