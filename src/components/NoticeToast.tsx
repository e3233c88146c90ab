import { useEffect } from 'react';
import type { StudyNotice } from '../lib/studyState';

const VISIBLE_MS: Record<StudyNotice['kind'], number> = { info: 3500, break: 8000 };

export function NoticeToast(props: { notice: StudyNotice | null; celebrate: boolean; onDismiss: (id: number) => void }) {
  const { notice, onDismiss } = props;

  useEffect(() => {
    if (!notice) return;
    const t = window.setTimeout(() => onDismiss(notice.id), VISIBLE_MS[notice.kind]);
    return () => window.clearTimeout(t);
  }, [notice, onDismiss]);

  if (!notice) return null;

  return (
    <>
      <div className={`pwaToast ${notice.kind === 'break' ? 'pwaToast--break' : ''}`} role="status">
        <span aria-hidden>{notice.kind === 'break' ? '🧠' : '⏱️'}</span>
        <span className="pwaToast__text">{notice.message}</span>
        <button className="pwaToast__btn pwaToast__btn--ghost" onClick={() => onDismiss(notice.id)} aria-label="Dismiss">
          ✕
        </button>
      </div>
      {notice.kind === 'break' && props.celebrate ? <Confetti key={notice.id} /> : null}
    </>
  );
}

const CONFETTI_COLORS = ['#FF4B4B', '#28a745', '#ffc107', '#007bff', '#9B51E0'];

function Confetti() {
  return (
    <div className="confetti" aria-hidden>
      {Array.from({ length: 24 }, (_, i) => (
        <span
          key={i}
          className="confettiPiece"
          style={{
            left: `${(i * 37) % 100}%`,
            background: CONFETTI_COLORS[i % CONFETTI_COLORS.length],
            animationDelay: `${(i % 6) * 90}ms`,
          }}
        />
      ))}
    </div>
  );
}
