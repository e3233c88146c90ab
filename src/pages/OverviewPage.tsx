import { useNavigate } from 'react-router-dom';
import { completedCount, progress } from '../lib/selection';
import type { StudyEvent, StudyState } from '../lib/studyState';

export function OverviewPage({ study, dispatch }: { study: StudyState; dispatch: (e: StudyEvent) => void }) {
  const navigate = useNavigate();

  return (
    <div className="page">
      <h1 className="h1">Overview</h1>
      <p className="sub">Every session at a glance. Sessions you haven’t opened yet show 0 done.</p>

      <div className="gridCards">
        {study.sessions.map((s) => {
          const frac = progress(study, s.session_id);
          return (
            <button
              key={s.session_id}
              className="cardLink"
              onClick={() => {
                dispatch({ type: 'select-session', title: s.session_title, now: Date.now() });
                navigate('/study');
              }}
            >
              <div className="sectionCard">
                <div className="sectionBar" style={{ width: `${Math.round(frac * 100)}%` }} />
                <div className="sectionBody">
                  <div className="sectionTitle">{s.session_title}</div>
                  <div className="sectionBlurb">
                    {completedCount(study, s.session_id)} / {s.topics.length} topics completed
                  </div>
                  <div className="sectionCta">Open →</div>
                </div>
              </div>
            </button>
          );
        })}
      </div>
    </div>
  );
}
