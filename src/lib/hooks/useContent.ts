import { useCallback, useEffect, useState } from 'react';
import { readSessions, type Session } from '../content';
import type { ContentError, ContentStore } from '../contentStore';

export type ContentStatus =
  | { status: 'loading' }
  | { status: 'error'; error: ContentError }
  | { status: 'ready'; sessions: Session[] };

export function useContent(store: ContentStore, path: string): { content: ContentStatus; retry: () => void } {
  const [content, setContent] = useState<ContentStatus>({ status: 'loading' });
  const [attempt, setAttempt] = useState(0);

  useEffect(() => {
    let live = true;
    setContent({ status: 'loading' });
    void store.load(path).then(
      (res) => {
        if (!live) return;
        setContent(res.ok ? { status: 'ready', sessions: readSessions(res.sessions) } : { status: 'error', error: res.error });
      },
      (e: unknown) => {
        if (!live) return;
        // Not a content problem: rethrow during render.
        setContent(() => {
          throw e instanceof Error ? e : new Error(String(e));
        });
      },
    );
    return () => {
      live = false;
    };
  }, [store, path, attempt]);

  const retry = useCallback(() => setAttempt((n) => n + 1), []);
  return { content, retry };
}
