export type Difficulty = 'Easy' | 'Medium' | 'Hard';

const DIFFICULTIES: readonly Difficulty[] = ['Easy', 'Medium', 'Hard'];

export type Topic = {
  topic_id: string;
  topic_title: string;
  /** null when the document carries no (or an unknown) difficulty. */
  difficulty: Difficulty | null;
  tags: string[];
  related_concepts: string[];
  content_markdown: string;
  interview_guidance: string;
  example_usage: string;
};

export type Session = {
  session_id: string;
  session_title: string;
  topics: Topic[];
};

type RawRecord = Record<string, unknown>;

function isRecord(v: unknown): v is RawRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function text(v: unknown, fallback = ''): string {
  return typeof v === 'string' ? v : fallback;
}

function nonBlank(v: unknown, fallback: string): string {
  const s = text(v).trim();
  return s ? s : fallback;
}

function stringList(v: unknown): string[] {
  if (!Array.isArray(v)) return [];
  return v.filter((x): x is string => typeof x === 'string');
}

function readDifficulty(v: unknown): Difficulty | null {
  return DIFFICULTIES.find((d) => d === v) ?? null;
}

/** Appends -2, -3, … to repeated ids so every id in the list is unique. */
function uniqueId(id: string, seen: Set<string>): string {
  if (!seen.has(id)) {
    seen.add(id);
    return id;
  }
  let n = 2;
  while (seen.has(`${id}-${n}`)) n++;
  const next = `${id}-${n}`;
  seen.add(next);
  return next;
}

function readTopic(raw: unknown, idx: number, seen: Set<string>): Topic {
  const r = isRecord(raw) ? raw : {};
  return {
    topic_id: uniqueId(nonBlank(r.topic_id, `topic-${idx + 1}`), seen),
    topic_title: nonBlank(r.topic_title, 'Untitled topic'),
    difficulty: readDifficulty(r.difficulty),
    tags: stringList(r.tags),
    related_concepts: stringList(r.related_concepts),
    content_markdown: text(r.content_markdown),
    interview_guidance: text(r.interview_guidance),
    example_usage: text(r.example_usage),
  };
}

/**
 * Reads raw session records the way the viewer displays them.
 *
 * The loader hands over the document untouched; anything missing here falls
 * back to a placeholder instead of failing, so a half-written content file
 * still renders.
 */
export function readSessions(raw: readonly unknown[]): Session[] {
  const sessionIds = new Set<string>();
  return raw.map((item, i) => {
    const r = isRecord(item) ? item : {};
    const topicIds = new Set<string>();
    const topics = Array.isArray(r.topics) ? r.topics : [];
    return {
      session_id: uniqueId(nonBlank(r.session_id, `session-${i + 1}`), sessionIds),
      session_title: nonBlank(r.session_title, `Session ${i + 1}`),
      topics: topics.map((t, j) => readTopic(t, j, topicIds)),
    };
  });
}
