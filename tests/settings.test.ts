import test from 'node:test';
import assert from 'node:assert/strict';
import {
  clampBreakMinutes,
  defaultSettings,
  loadSettings,
  parseBreakMinutes,
  saveSettings,
  SETTINGS_EVENT,
} from '../src/lib/settings.ts';

function makeMemStorage() {
  const m = new Map<string, string>();
  return {
    getItem(k: string) {
      return m.get(k) ?? null;
    },
    setItem(k: string, v: string) {
      m.set(k, String(v));
    },
    removeItem(k: string) {
      m.delete(k);
    },
    clear() {
      m.clear();
    },
  };
}

function installGlobal(name: 'localStorage' | 'window', value: unknown) {
  Object.defineProperty(globalThis, name, { value, configurable: true, writable: true });
}

test('loadSettings falls back to defaults when nothing is stored', () => {
  installGlobal('localStorage', makeMemStorage());
  assert.deepEqual(loadSettings(), { version: 1, breakMinutes: 2, celebrate: true });
  assert.deepEqual(defaultSettings(), { version: 1, breakMinutes: 2, celebrate: true });
});

test('saveSettings persists and emits study_hub_settings_changed in-tab', () => {
  const storage = makeMemStorage();
  installGlobal('localStorage', storage);
  const win = new EventTarget();
  installGlobal('window', win);

  let fired = 0;
  win.addEventListener(SETTINGS_EVENT, () => {
    fired += 1;
  });

  saveSettings({ version: 1, breakMinutes: 20, celebrate: false });
  assert.equal(fired, 1);
  assert.equal(storage.getItem('study_hub_settings_v1'), '{"version":1,"breakMinutes":20,"celebrate":false}');
  assert.deepEqual(loadSettings(), { version: 1, breakMinutes: 20, celebrate: false });
});

test('loadSettings clamps and fills stored values', () => {
  const storage = makeMemStorage();
  installGlobal('localStorage', storage);

  storage.setItem('study_hub_settings_v1', JSON.stringify({ version: 1, breakMinutes: 500 }));
  assert.deepEqual(loadSettings(), { version: 1, breakMinutes: 120, celebrate: true });

  storage.setItem('study_hub_settings_v1', JSON.stringify({ version: 1, breakMinutes: 'soon', celebrate: false }));
  assert.deepEqual(loadSettings(), { version: 1, breakMinutes: 2, celebrate: false });
});

test('loadSettings ignores unreadable or foreign data', () => {
  const storage = makeMemStorage();
  installGlobal('localStorage', storage);

  storage.setItem('study_hub_settings_v1', '{oops');
  assert.deepEqual(loadSettings(), defaultSettings());

  storage.setItem('study_hub_settings_v1', JSON.stringify({ version: 9, breakMinutes: 30 }));
  assert.deepEqual(loadSettings(), defaultSettings());

  storage.setItem('study_hub_settings_v1', 'null');
  assert.deepEqual(loadSettings(), defaultSettings());
});

test('clampBreakMinutes keeps minutes within 1..120', () => {
  assert.equal(clampBreakMinutes(Number.NaN), 2);
  assert.equal(clampBreakMinutes(0), 1);
  assert.equal(clampBreakMinutes(7.4), 7);
  assert.equal(clampBreakMinutes(121), 120);
});

test('parseBreakMinutes keeps the previous value for blank or partial input', () => {
  assert.equal(parseBreakMinutes('', 20), 20);
  assert.equal(parseBreakMinutes('  ', 20), 20);
  assert.equal(parseBreakMinutes('4x', 20), 20);
  assert.equal(parseBreakMinutes('45', 20), 45);
  assert.equal(parseBreakMinutes(' 0 ', 20), 1);
  assert.equal(parseBreakMinutes('300', 20), 120);
});
