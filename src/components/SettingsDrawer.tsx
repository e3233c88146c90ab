import { useEffect, useState } from 'react';
import {
  BREAK_MINUTES_MAX,
  BREAK_MINUTES_MIN,
  defaultSettings,
  loadSettings,
  parseBreakMinutes,
  saveSettings,
  type Settings,
} from '../lib/settings';

const BREAK_PRESETS = [2, 5, 20, 45];

export function SettingsDrawer(props: { open: boolean; onClose: () => void }) {
  const [draft, setDraft] = useState<Settings>(() => loadSettings());
  /** Raw text of the minutes field; parsed only when it loses focus or on Enter. */
  const [minutesText, setMinutesText] = useState(() => String(draft.breakMinutes));

  // Whenever it opens, reload latest settings.
  useEffect(() => {
    if (!props.open) return;
    const s = loadSettings();
    setDraft(s);
    setMinutesText(String(s.breakMinutes));
  }, [props.open]);

  // Allow Esc to close.
  useEffect(() => {
    if (!props.open) return;
    function onKeyDown(e: KeyboardEvent) {
      if (e.key === 'Escape') props.onClose();
    }
    window.addEventListener('keydown', onKeyDown);
    return () => window.removeEventListener('keydown', onKeyDown);
  }, [props.open, props.onClose]);

  if (!props.open) return null;

  function commit(next: Settings) {
    setDraft(next);
    setMinutesText(String(next.breakMinutes));
    saveSettings(next);
  }

  function commitMinutesText() {
    commit({ ...draft, breakMinutes: parseBreakMinutes(minutesText, draft.breakMinutes) });
  }

  return (
    <div className="configOverlay" role="dialog" aria-modal="true" aria-label="Settings">
      <button className="configBackdrop" aria-label="Close settings" onClick={props.onClose} />
      <div className="configPanel">
        <div className="configHeader">
          <div>
            <div className="configTitle">Settings</div>
            <div className="configSub">Kept on this device. Progress checkmarks are not.</div>
          </div>
          <button className="ghost" onClick={props.onClose} aria-label="Close">
            ✕
          </button>
        </div>

        <div className="configSection">
          <div className="configH">Study timer</div>

          <div className="configRow">
            <span className="configLabel">Break after</span>
            <span className="configValue">{draft.breakMinutes} min</span>
            <div className="configActions">
              {BREAK_PRESETS.map((m) => (
                <button
                  key={m}
                  className={m === draft.breakMinutes ? 'primary' : 'ghost'}
                  onClick={() => commit({ ...draft, breakMinutes: m })}
                >
                  {m}
                </button>
              ))}
              <input
                type="number"
                className="configNumber"
                min={BREAK_MINUTES_MIN}
                max={BREAK_MINUTES_MAX}
                value={minutesText}
                aria-label="Break after (minutes)"
                onChange={(e) => setMinutesText(e.currentTarget.value)}
                onBlur={commitMinutesText}
                onKeyDown={(e) => {
                  if (e.key === 'Enter') commitMinutesText();
                }}
              />
            </div>
          </div>

          <div className="configRow">
            <span className="configLabel">Celebrate breaks</span>
            <span className="configValue">{draft.celebrate ? 'On' : 'Off'}</span>
            <div className="configActions">
              <button className="ghost" onClick={() => commit({ ...draft, celebrate: !draft.celebrate })}>
                {draft.celebrate ? 'Turn off' : 'Turn on'}
              </button>
            </div>
          </div>

          <div style={{ fontSize: 12, opacity: 0.75, marginTop: 8 }}>
            A new break length applies to the running timer straight away.
          </div>
        </div>

        <div className="configSection">
          <button className="ghost" onClick={() => commit(defaultSettings())}>
            Restore defaults
          </button>
        </div>
      </div>
    </div>
  );
}
