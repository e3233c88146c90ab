import { useState } from 'react';
import { DifficultyBadge, TagRow } from '../components/Badges';
import { TopicMarkdown } from '../components/TopicMarkdown';
import { currentSession, currentTopic } from '../lib/selection';
import type { StudyState } from '../lib/studyState';

type TabId = 'concepts' | 'guidance' | 'example';

const TABS: Array<{ id: TabId; label: string }> = [
  { id: 'concepts', label: '🧠 Core Concepts' },
  { id: 'guidance', label: '🎤 Interview Guidance' },
  { id: 'example', label: '📌 Real-World Example' },
];

export function TopicPage({ study }: { study: StudyState }) {
  const [tab, setTab] = useState<TabId>('concepts');
  const session = currentSession(study);
  const topic = currentTopic(study);

  if (!session) {
    return (
      <div className="page">
        <h1 className="h1">Nothing to study</h1>
        <div className="callout">The content file has no sessions.</div>
      </div>
    );
  }

  if (!topic) {
    return (
      <div className="page">
        <h1 className="h1">{session.session_title}</h1>
        <div className="callout">No topics in this session yet.</div>
      </div>
    );
  }

  return (
    <div className="page topicPage">
      <div className="sub">{session.session_title}</div>
      <h1 className="h1">{topic.topic_title}</h1>

      <div className="tagRow">
        <span className="tagRowLabel">Difficulty:</span>
        <DifficultyBadge difficulty={topic.difficulty} />
      </div>
      <TagRow label="Tags" items={topic.tags} variant="tag" />
      <TagRow label="Related concepts" items={topic.related_concepts} variant="concept" />

      <div className="tabs" role="tablist">
        {TABS.map((t) => (
          <button
            key={t.id}
            role="tab"
            aria-selected={tab === t.id}
            className={`tabBtn ${tab === t.id ? 'active' : ''}`}
            onClick={() => setTab(t.id)}
          >
            {t.label}
          </button>
        ))}
      </div>

      <div className="tabPanel" role="tabpanel">
        {tab === 'concepts' ? <TopicMarkdown markdown={topic.content_markdown} /> : null}
        {tab === 'guidance' ? (
          <div className="callout callout--info">
            <span aria-hidden>💡</span> {topic.interview_guidance || 'No interview guidance for this topic yet.'}
          </div>
        ) : null}
        {tab === 'example' ? (
          <div className="callout callout--success">
            <span aria-hidden>✅</span> {topic.example_usage || 'No example for this topic yet.'}
          </div>
        ) : null}
      </div>
    </div>
  );
}
