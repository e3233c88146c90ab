import Markdown from 'react-markdown';
import { extractDiagram } from '../lib/diagram';
import { DiagramBlock } from './DiagramBlock';

export function TopicMarkdown({ markdown }: { markdown: string }) {
  if (!markdown.trim()) return <div className="callout">No notes for this topic yet.</div>;

  const { before, diagram, after } = extractDiagram(markdown);
  return (
    <div className="markdown">
      {before.trim() ? <Markdown>{before}</Markdown> : null}
      {diagram != null ? <DiagramBlock source={diagram} /> : null}
      {after.trim() ? <Markdown>{after}</Markdown> : null}
    </div>
  );
}
