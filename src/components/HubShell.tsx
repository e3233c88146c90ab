import { useMemo, useState, type CSSProperties } from 'react';
import { NavLink, Outlet, useLocation } from 'react-router-dom';
import { breakProgress, formatClock, timeRemainingMs } from '../lib/breakTimer';
import { completedCount, currentSession, currentTopic, isTopicComplete, progress } from '../lib/selection';
import type { StudyEvent, StudyState } from '../lib/studyState';
import { SettingsDrawer } from './SettingsDrawer';

type Tab = { to: string; label: string; icon: string; accent: string };

const TABS: Tab[] = [
  { to: '/study', label: 'Study', icon: '●', accent: 'var(--route-red)' },
  { to: '/overview', label: 'Overview', icon: '▦', accent: 'var(--route-blue)' },
];

function pct(n: number) {
  return `${Math.round(Math.max(0, Math.min(1, n)) * 100)}%`;
}

export function HubShell({ study, dispatch }: { study: StudyState; dispatch: (e: StudyEvent) => void }) {
  const [configOpen, setConfigOpen] = useState(false);
  const loc = useLocation();

  const activeTab = useMemo(() => {
    return TABS.find((t) => loc.pathname === t.to || loc.pathname.startsWith(`${t.to}/`)) ?? TABS[0];
  }, [loc.pathname]);

  const shellStyle = { '--tab-accent': activeTab.accent } as CSSProperties;

  const session = currentSession(study);
  const topic = currentTopic(study);
  const done = session ? completedCount(study, session.session_id) : 0;
  const total = session?.topics.length ?? 0;
  const frac = session ? progress(study, session.session_id) : 0;

  const remaining = timeRemainingMs(study.timer, study.clock);
  const timerFrac = breakProgress(study.timer, study.clock);

  return (
    <div className="shell" style={shellStyle}>
      <aside className="sideNav" aria-label="primary">
        <div className="brandBlock">
          <div className="brandRow">
            <div>
              <div className="brandName">🧠 Learning Hub</div>
              <div className="brandSub">sessions • topics • breaks</div>
            </div>
            <button className="configBtn" onClick={() => setConfigOpen(true)} aria-label="Open settings">
              ⚙
            </button>
          </div>
        </div>

        <nav className="navList">
          {TABS.map((t) => (
            <NavLink
              key={t.to}
              to={t.to}
              style={{ '--item-accent': t.accent } as CSSProperties}
              className={({ isActive }) => `navItem ${isActive ? 'active' : ''}`}
            >
              <span className="navIcon" aria-hidden>
                {t.icon}
              </span>
              <span className="navLabel">{t.label}</span>
            </NavLink>
          ))}
        </nav>

        <div className="sideSection">
          <label className="sideH" htmlFor="session-picker">
            Choose a learning session
          </label>
          <select
            id="session-picker"
            className="sessionPicker"
            value={session?.session_title ?? ''}
            onChange={(e) => dispatch({ type: 'select-session', title: e.currentTarget.value, now: Date.now() })}
          >
            {study.sessions.map((s) => (
              <option key={s.session_id} value={s.session_title}>
                {s.session_title}
              </option>
            ))}
          </select>
        </div>

        {session ? (
          <div className="sideSection" role="radiogroup" aria-label="Select a topic">
            <div className="sideH">Select a topic</div>
            {session.topics.length ? (
              session.topics.map((t) => (
                <label key={t.topic_id} className={`topicOption ${t.topic_id === study.topicId ? 'active' : ''}`}>
                  <input
                    type="radio"
                    name={`topic_radio_${session.session_id}`}
                    checked={t.topic_id === study.topicId}
                    onChange={() => dispatch({ type: 'select-topic', title: t.topic_title, now: Date.now() })}
                  />
                  <span className="topicOptionTitle">{t.topic_title}</span>
                  {isTopicComplete(study, session.session_id, t.topic_id) ? (
                    <span className="topicDone" aria-label="completed">
                      ✓
                    </span>
                  ) : null}
                </label>
              ))
            ) : (
              <div className="sideEmpty">This session has no topics yet.</div>
            )}
          </div>
        ) : null}

        {session ? (
          <div className="sideSection">
            <div className="sideH">Your progress</div>
            <div className="progressTrack" aria-label="session progress">
              <div className="progressFill" style={{ width: pct(frac) }} />
            </div>
            <div className="progressText">
              {done} / {total} Topics Completed
            </div>
            {topic ? (
              <label className="completeToggle">
                <input
                  type="checkbox"
                  checked={isTopicComplete(study, session.session_id, topic.topic_id)}
                  onChange={(e) =>
                    dispatch({
                      type: 'toggle-completion',
                      topicId: topic.topic_id,
                      value: e.currentTarget.checked,
                      now: Date.now(),
                    })
                  }
                />
                Mark as complete
              </label>
            ) : null}
          </div>
        ) : null}

        <div className="sideSection">
          <div className="sideH">Study timer ⏱️</div>
          <div className="progressTrack" aria-label="time until break">
            <div className="progressFill progressFill--timer" style={{ width: pct(timerFrac) }} />
          </div>
          <div className="progressText">
            {remaining > 0 ? `${formatClock(remaining)} until your break` : 'Break time!'}
          </div>
          <button className="ghost" onClick={() => dispatch({ type: 'reset-timer', now: Date.now() })}>
            Reset {Math.round(study.timer.thresholdMs / 60_000)}-min break timer
          </button>
        </div>
      </aside>

      <div className="mainCol">
        <button className="configBtnFloating" onClick={() => setConfigOpen(true)} aria-label="Open settings">
          ⚙
        </button>
        <div className="content">
          <Outlet />
        </div>
      </div>

      <SettingsDrawer open={configOpen} onClose={() => setConfigOpen(false)} />
    </div>
  );
}
