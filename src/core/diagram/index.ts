export { type DiagramInput, mermaidNodeId, renderDependencyDiagram } from './mermaid.js';
