/**
 * Dependency diagram rendering
 *
 * The diagram is a fenced Mermaid block so it can be pasted straight into
 * markdown (review comments, docs).
 */

export interface DiagramInput {
  nodes: readonly string[];
  /** [dependency, dependent] pairs */
  edges: ReadonlyArray<readonly [string, string]>;
}

export function mermaidNodeId(id: string): string {
  return id.replace(/[^A-Za-z0-9_]/g, '_');
}

export function renderDependencyDiagram(input: DiagramInput): string {
  const lines = ['```mermaid', 'graph LR'];

  for (const node of input.nodes) {
    lines.push(`  ${mermaidNodeId(node)}["${node}"]`);
  }
  for (const [dependency, dependent] of input.edges) {
    lines.push(`  ${mermaidNodeId(dependency)} --> ${mermaidNodeId(dependent)}`);
  }

  lines.push('```');
  return `${lines.join('\n')}\n`;
}
