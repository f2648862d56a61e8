import { describe, expect, it } from 'vitest';
import { mermaidNodeId, renderDependencyDiagram } from '../../src/core/diagram/index.js';

describe('Dependency diagram', () => {
  it('should turn ids into valid mermaid node ids', () => {
    expect(mermaidNodeId('sk-cloudprov')).toBe('sk_cloudprov');
    expect(mermaidNodeId('a.b/c')).toBe('a_b_c');
  });

  it('should render one node per application and one edge per dependency', () => {
    const diagram = renderDependencyDiagram({
      nodes: ['sk-cloudprov', 'cluster-autoscaler'],
      edges: [['sk-cloudprov', 'cluster-autoscaler']],
    });

    expect(diagram).toBe(
      [
        '```mermaid',
        'graph LR',
        '  sk_cloudprov["sk-cloudprov"]',
        '  cluster_autoscaler["cluster-autoscaler"]',
        '  sk_cloudprov --> cluster_autoscaler',
        '```',
        '',
      ].join('\n')
    );
  });
});
