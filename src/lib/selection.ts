import type { Session, Topic } from './content';

export type CompletionMap = Record<string, boolean>;

export type SelectionState = {
  sessions: Session[];
  sessionId: string | null;
  /** null when the selected session has no topics. */
  topicId: string | null;
  /** One map per session, created the first time it is viewed. */
  completion: Record<string, CompletionMap>;
  /** Remembers the topic last shown in each session. */
  lastTopicBySession: Record<string, string>;
};

function emptyCompletion(session: Session): CompletionMap {
  const m: CompletionMap = {};
  for (const t of session.topics) m[t.topic_id] = false;
  return m;
}

function withCompletionFor(completion: Record<string, CompletionMap>, session: Session): Record<string, CompletionMap> {
  if (completion[session.session_id]) return completion;
  return { ...completion, [session.session_id]: emptyCompletion(session) };
}

function findSession(s: SelectionState, sessionId: string | null): Session | null {
  if (sessionId == null) return null;
  return s.sessions.find((x) => x.session_id === sessionId) ?? null;
}

export function currentSession(s: SelectionState): Session | null {
  return findSession(s, s.sessionId);
}

export function currentTopic(s: SelectionState): Topic | null {
  const session = currentSession(s);
  if (!session || s.topicId == null) return null;
  return session.topics.find((t) => t.topic_id === s.topicId) ?? null;
}

function showSession(s: SelectionState, session: Session, topicId: string | null): SelectionState {
  return {
    ...s,
    sessionId: session.session_id,
    topicId,
    completion: withCompletionFor(s.completion, session),
    lastTopicBySession:
      topicId == null ? s.lastTopicBySession : { ...s.lastTopicBySession, [session.session_id]: topicId },
  };
}

export function initSelection(sessions: Session[]): SelectionState {
  const base: SelectionState = { sessions, sessionId: null, topicId: null, completion: {}, lastTopicBySession: {} };
  const first = sessions[0];
  if (!first) return base;
  return showSession(base, first, first.topics[0]?.topic_id ?? null);
}

/**
 * Unknown titles fall back to the first session. The topic last viewed in the
 * target session comes back with it, otherwise its first topic.
 */
export function selectSession(s: SelectionState, title: string): SelectionState {
  const session = s.sessions.find((x) => x.session_title === title) ?? s.sessions[0];
  if (!session) return s;
  const remembered = s.lastTopicBySession[session.session_id];
  const topic = session.topics.find((t) => t.topic_id === remembered) ?? session.topics[0];
  return showSession(s, session, topic?.topic_id ?? null);
}

/** Unknown titles fall back to the first topic of the current session. */
export function selectTopic(s: SelectionState, title: string): SelectionState {
  const session = currentSession(s);
  if (!session) return s;
  const topic = session.topics.find((t) => t.topic_title === title) ?? session.topics[0];
  return showSession(s, session, topic?.topic_id ?? null);
}

export function toggleCompletion(s: SelectionState, topicId: string, value: boolean): SelectionState {
  const session = currentSession(s);
  if (!session) return s;
  if (!session.topics.some((t) => t.topic_id === topicId)) return s;

  const map = s.completion[session.session_id] ?? emptyCompletion(session);
  if (map[topicId] === value) return s;
  return {
    ...s,
    completion: { ...s.completion, [session.session_id]: { ...map, [topicId]: value } },
  };
}

export function isTopicComplete(s: SelectionState, sessionId: string, topicId: string): boolean {
  return s.completion[sessionId]?.[topicId] === true;
}

export function completedCount(s: SelectionState, sessionId: string): number {
  const session = findSession(s, sessionId);
  if (!session) return 0;
  return session.topics.filter((t) => isTopicComplete(s, sessionId, t.topic_id)).length;
}

/** completed / total in 0..1; 0 for unknown or empty sessions. */
export function progress(s: SelectionState, sessionId: string): number {
  const session = findSession(s, sessionId);
  const total = session?.topics.length ?? 0;
  if (total === 0) return 0;
  return completedCount(s, sessionId) / total;
}
