import type { Session, Topic } from '../src/lib/content.ts';

export function topic(id: string, title: string): Topic {
  return {
    topic_id: id,
    topic_title: title,
    difficulty: 'Medium',
    tags: [],
    related_concepts: [],
    content_markdown: '',
    interview_guidance: '',
    example_usage: '',
  };
}

export function makeSessions(): Session[] {
  return [
    { session_id: 'core', session_title: 'Core', topics: [topic('a', 'A'), topic('b', 'B')] },
    { session_id: 'data', session_title: 'Data', topics: [topic('idx', 'Indexes'), topic('tx', 'Transactions')] },
    { session_id: 'soon', session_title: 'Soon', topics: [] },
  ];
}
