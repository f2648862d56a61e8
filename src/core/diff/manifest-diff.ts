/**
 * Manifest diff
 *
 * Compares a freshly rendered manifest stream with a baseline stream (usually
 * the manifests currently checked in or deployed) object by object.
 */

import { type } from 'arktype';
import jsonPatch from 'fast-json-patch';
import type { Operation } from 'fast-json-patch';
import { InvalidConfigurationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { parseYamlStream } from '../serialization/index.js';
import { manifestKey } from '../types/index.js';

const { compare } = jsonPatch;

const logger = getComponentLogger('manifest-diff');

const ManifestIdentity = type({
  kind: 'string',
  metadata: {
    name: 'string',
    'namespace?': 'string',
  },
});

export type ObjectChange =
  | { status: 'added'; key: string }
  | { status: 'removed'; key: string }
  | { status: 'changed'; key: string; operations: Operation[]; recreatesPods: boolean };

export interface ManifestDiff {
  changes: ObjectChange[];
  unchanged: number;
}

export function diffManifestStreams(baseline: string | undefined, current: string): ManifestDiff {
  const before = keyDocuments(baseline === undefined ? [] : parseYamlStream(baseline), 'baseline');
  const after = keyDocuments(parseYamlStream(current), 'current');

  const changes: ObjectChange[] = [];
  let unchanged = 0;

  for (const [key, document] of after) {
    const previous = before.get(key);
    if (previous === undefined) {
      changes.push({ status: 'added', key });
      continue;
    }

    const operations = compare(previous, document);
    if (operations.length === 0) {
      unchanged += 1;
    } else {
      changes.push({
        status: 'changed',
        key,
        operations,
        recreatesPods: operations.some((operation) => operation.path.startsWith('/spec/template')),
      });
    }
  }

  for (const key of before.keys()) {
    if (!after.has(key)) {
      changes.push({ status: 'removed', key });
    }
  }

  return { changes, unchanged };
}

export function renderManifestDiff(diff: ManifestDiff): string {
  const count = (status: ObjectChange['status']): number =>
    diff.changes.filter((change) => change.status === status).length;

  const lines = [
    `# ${count('added')} new, ${count('removed')} removed, ${count('changed')} changed, ${diff.unchanged} unchanged`,
    '```diff',
  ];

  for (const change of diff.changes) {
    switch (change.status) {
      case 'added':
        lines.push(`+ ${change.key}`);
        break;
      case 'removed':
        lines.push(`- ${change.key}`);
        break;
      case 'changed':
        lines.push(`~ ${change.key}${change.recreatesPods ? ' (causes pod recreation)' : ''}`);
        for (const operation of change.operations) {
          lines.push(`    ${formatOperation(operation)}`);
        }
        break;
    }
  }

  lines.push('```');
  return `${lines.join('\n')}\n`;
}

function formatOperation(operation: Operation): string {
  if ('value' in operation) {
    return `${operation.op} ${operation.path}: ${JSON.stringify(operation.value)}`;
  }
  if ('from' in operation) {
    return `${operation.op} ${operation.path} from ${operation.from}`;
  }
  return `${operation.op} ${operation.path}`;
}

function keyDocuments(documents: unknown[], source: string): Map<string, object> {
  const keyed = new Map<string, object>();
  for (const [index, document] of documents.entries()) {
    const identity = ManifestIdentity(document);
    if (identity instanceof type.errors || typeof document !== 'object' || document === null) {
      logger.warn('Skipping document without kind and name', { source, index });
      continue;
    }
    const key = manifestKey(identity);
    if (keyed.has(key)) {
      throw new InvalidConfigurationError(
        `Manifest stream '${source}' declares ${key} more than once (document ${index})`,
        source,
        key
      );
    }
    keyed.set(key, document);
  }
  return keyed;
}
