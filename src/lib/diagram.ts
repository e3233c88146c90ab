export type DiagramSplit = {
  before: string;
  /** Source of the first diagram block, without its fences. */
  diagram: string | null;
  after: string;
};

const OPEN = '```mermaid';
const CLOSE = '```';

/**
 * Splits the first fenced diagram block out of topic markdown. Only the first
 * complete block is taken; later ones stay in `after` as plain code blocks.
 */
export function extractDiagram(markdown: string): DiagramSplit {
  const start = markdown.indexOf(OPEN);
  if (start < 0) return { before: markdown, diagram: null, after: '' };

  const bodyStart = markdown.indexOf('\n', start + OPEN.length);
  if (bodyStart < 0) return { before: markdown, diagram: null, after: '' };

  const end = markdown.indexOf(CLOSE, bodyStart + 1);
  if (end < 0) return { before: markdown, diagram: null, after: '' };

  return {
    before: markdown.slice(0, start),
    diagram: markdown.slice(bodyStart + 1, end).trim(),
    after: markdown.slice(end + CLOSE.length),
  };
}
