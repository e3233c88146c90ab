import { useEffect, useRef } from 'react';

/**
 * Calls `onRecheck(Date.now())` when the page becomes relevant again:
 * - window focus
 * - tab visible again
 * - optional custom in-tab events (e.g. study_hub_settings_changed)
 *
 * There is no interval here: between these wake-ups the UI only moves when the
 * user interacts.
 */
export function useRecheck(onRecheck: (now: number) => void, extraEvents: string[] = []) {
  const cb = useRef(onRecheck);
  cb.current = onRecheck;

  useEffect(() => {
    function bump() {
      if (document.visibilityState === 'hidden') return;
      cb.current(Date.now());
    }

    window.addEventListener('focus', bump);
    document.addEventListener('visibilitychange', bump);
    for (const ev of extraEvents) window.addEventListener(ev, bump);

    return () => {
      window.removeEventListener('focus', bump);
      document.removeEventListener('visibilitychange', bump);
      for (const ev of extraEvents) window.removeEventListener(ev, bump);
    };
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [extraEvents.join('|')]);
}
