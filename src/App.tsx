import { useCallback, useEffect, useMemo, useReducer, useRef, useState } from 'react';
import { Routes, Route, Navigate } from 'react-router-dom';
import { registerSW } from 'virtual:pwa-register';
import { HubShell } from './components/HubShell';
import { NoticeToast } from './components/NoticeToast';
import { TopicPage } from './pages/TopicPage';
import { OverviewPage } from './pages/OverviewPage';
import { minutesToMs } from './lib/breakTimer';
import type { Session } from './lib/content';
import { contentPathFrom } from './lib/config';
import { contentErrorMessage, createContentStore } from './lib/contentStore';
import { useContent } from './lib/hooks/useContent';
import { useRecheck } from './lib/hooks/useRecheck';
import { loadSettings, SETTINGS_EVENT, type Settings } from './lib/settings';
import { breakReminder, initStudyState, update } from './lib/studyState';
import './App.css';

const contentStore = createContentStore();
const CONTENT_PATH = contentPathFrom(import.meta.env);
const RECHECK_EVENTS = [SETTINGS_EVENT];

function StudyApp({ sessions }: { sessions: Session[] }) {
  const [settings, setSettings] = useState<Settings>(() => loadSettings());
  const [study, dispatch] = useReducer(update, sessions, (s) =>
    initStudyState(s, Date.now(), minutesToMs(settings.breakMinutes)),
  );

  useRecheck((now) => {
    const next = loadSettings();
    setSettings(next);
    const thresholdMs = minutesToMs(next.breakMinutes);
    if (thresholdMs !== study.timer.thresholdMs) dispatch({ type: 'set-threshold', thresholdMs, now });
    else dispatch({ type: 'check-timer', now });
  }, RECHECK_EVENTS);

  // Showing the break reminder acknowledges it. The ref keeps StrictMode's
  // double effect from acknowledging one episode twice.
  const acknowledged = useRef<number | null>(null);
  const reminder = breakReminder(study);
  const reminderId = study.notice?.kind === 'break' ? study.notice.id : null;
  useEffect(() => {
    if (!reminder.due || reminderId == null) return;
    if (acknowledged.current === reminderId) return;
    acknowledged.current = reminderId;
    dispatch({ type: 'acknowledge-reminder', now: Date.now() });
  }, [reminder.due, reminderId]);

  const onDismiss = useCallback((id: number) => dispatch({ type: 'dismiss-notice', id, now: Date.now() }), []);

  return (
    <>
      <Routes>
        <Route element={<HubShell study={study} dispatch={dispatch} />}>
          <Route index element={<Navigate to="/study" replace />} />
          <Route path="/study" element={<TopicPage study={study} />} />
          <Route path="/overview" element={<OverviewPage study={study} dispatch={dispatch} />} />
        </Route>
        <Route path="*" element={<Navigate to="/study" replace />} />
      </Routes>

      <NoticeToast notice={study.notice} celebrate={settings.celebrate} onDismiss={onDismiss} />
    </>
  );
}

function App() {
  const { content, retry } = useContent(contentStore, CONTENT_PATH);

  const [pwaNeedRefresh, setPwaNeedRefresh] = useState(false);
  const [pwaOfflineReady, setPwaOfflineReady] = useState(false);
  const [doPwaUpdate, setDoPwaUpdate] = useState<null | (() => void)>(null);

  useEffect(() => {
    // Register SW and surface updates explicitly (don’t auto-reload mid-topic).
    const updateSW = registerSW({
      onNeedRefresh() {
        setPwaNeedRefresh(true);
      },
      onOfflineReady() {
        setPwaOfflineReady(true);
        window.setTimeout(() => setPwaOfflineReady(false), 4000);
      },
    });

    setDoPwaUpdate(() => () => void updateSW(true));
  }, []);

  const body = useMemo(() => {
    if (content.status === 'loading') return <div className="page sub">Loading sessions…</div>;
    if (content.status === 'error') {
      return (
        <div className="page">
          <h1 className="h1">🚨 Can’t open the study material</h1>
          <div className="callout callout--error">{contentErrorMessage(content.error)}</div>
          <button
            className="primary"
            onClick={() => {
              contentStore.clear();
              retry();
            }}
          >
            Retry
          </button>
        </div>
      );
    }
    return <StudyApp sessions={content.sessions} />;
  }, [content, retry]);

  return (
    <>
      {body}

      {pwaOfflineReady ? <div className="pwaToast">Ready for offline</div> : null}

      {pwaNeedRefresh ? (
        <div className="pwaToast pwaToast--action">
          <div className="pwaToast__text">Update available</div>
          <button
            className="pwaToast__btn"
            onClick={() => {
              setPwaNeedRefresh(false);
              doPwaUpdate?.();
            }}
          >
            Reload
          </button>
          <button className="pwaToast__btn pwaToast__btn--ghost" onClick={() => setPwaNeedRefresh(false)}>
            Later
          </button>
        </div>
      ) : null}
    </>
  );
}

export default App;
