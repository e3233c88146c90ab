/** Diagram collaborator: receives the block's source, shows it as text. */
export function DiagramBlock({ source }: { source: string }) {
  return (
    <figure className="diagramBlock" aria-label="diagram">
      <pre className="diagramSource">{source}</pre>
      <figcaption className="diagramCaption">Diagram</figcaption>
    </figure>
  );
}
