/**
 * YAML rendering for manifests and kustomize files
 */

import * as yaml from 'js-yaml';

export interface YamlRenderOptions {
  indent?: number;
  lineWidth?: number;
}

const DOCUMENT_SEPARATOR = '---\n';

/**
 * Render one document; key order follows object construction order
 */
export function toYaml(document: object, options?: YamlRenderOptions): string {
  return yaml.dump(document, {
    indent: options?.indent ?? 2,
    lineWidth: options?.lineWidth ?? -1,
    noRefs: true,
    sortKeys: false,
    quotingType: '"',
    forceQuotes: false,
  });
}

/**
 * Render several documents as one multi-document stream
 */
export function toYamlStream(documents: readonly object[], options?: YamlRenderOptions): string {
  return documents.map((document) => `${DOCUMENT_SEPARATOR}${toYaml(document, options)}`).join('');
}

/**
 * Parse a multi-document stream, skipping empty documents
 */
export function parseYamlStream(content: string): unknown[] {
  return yaml.loadAll(content).filter((document) => document !== null && document !== undefined);
}
