import { describe, expect, it } from 'vitest';
import { parseYamlStream, toYaml, toYamlStream } from '../../src/core/serialization/index.js';

describe('YAML serialization', () => {
  it('should keep key construction order', () => {
    expect(toYaml({ kind: 'Namespace', apiVersion: 'v1', metadata: { name: 'simkube' } })).toBe(
      'kind: Namespace\napiVersion: v1\nmetadata:\n  name: simkube\n'
    );
  });

  it('should quote strings that would otherwise parse as other types', () => {
    expect(toYaml({ value: 'true', port: '8080' })).toBe('value: "true"\nport: "8080"\n');
  });

  it('should prefix every document of a stream with a separator', () => {
    expect(toYamlStream([{ a: 1 }, { b: 'two' }])).toBe('---\na: 1\n---\nb: two\n');
    expect(toYamlStream([])).toBe('');
  });

  it('should parse streams back and skip empty documents', () => {
    expect(parseYamlStream('---\na: 1\n---\n---\nb: two\n')).toEqual([{ a: 1 }, { b: 'two' }]);
  });
});
