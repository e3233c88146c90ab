import type { Difficulty } from '../lib/content';

export function DifficultyBadge({ difficulty }: { difficulty: Difficulty | null }) {
  if (!difficulty) return <span className="tag difficulty-unrated">Unrated</span>;
  return <span className={`tag difficulty-${difficulty}`}>{difficulty}</span>;
}

export function TagRow({ label, items, variant }: { label: string; items: string[]; variant: 'tag' | 'concept' }) {
  return (
    <div className="tagRow">
      <span className="tagRowLabel">{label}:</span>
      {items.length ? (
        items.map((x) => (
          <span key={x} className={`tag ${variant === 'tag' ? 'tag-item' : 'concept-item'}`}>
            {x}
          </span>
        ))
      ) : (
        <span className="tagRowEmpty">none</span>
      )}
    </div>
  );
}
