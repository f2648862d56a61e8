import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDefaultRegistry } from '../../src/applications/index.js';
import { loadPackagingConfig } from '../../src/core/config/index.js';
import { MissingRequiredConfigurationError } from '../../src/core/errors.js';
import { runPackaging } from '../../src/packaging/index.js';

function readTree(root: string): Record<string, string> {
  const files: Record<string, string> = {};
  for (const entry of fs.readdirSync(root, { withFileTypes: true })) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      for (const [nested, content] of Object.entries(readTree(fullPath))) {
        files[path.join(entry.name, nested)] = content;
      }
    } else {
      files[entry.name] = fs.readFileSync(fullPath, 'utf8');
    }
  }
  return files;
}

describe('runPackaging', () => {
  let workDir: string;
  let outDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'simkube-run-'));
    outDir = path.join(workDir, 'out');
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should write the dev stream and its two artifacts', () => {
    const config = loadPackagingConfig({ outDir }, { BUILD_DIR: path.join(workDir, 'build') });

    const result = runPackaging(createDefaultRegistry(), config);

    expect(result).toEqual({
      mode: 'dev-graph',
      outDir,
      manifests: [path.join(outDir, 'simkube.k8s.yaml')],
      artifacts: [path.join(outDir, 'dag.mermaid'), path.join(outDir, 'k8s.df')],
      overlays: [],
    });
    expect(fs.readdirSync(outDir).sort()).toEqual(['dag.mermaid', 'k8s.df', 'simkube.k8s.yaml']);
  });

  it('should leave exactly three overlay directories after a release run', () => {
    const config = loadPackagingConfig({ kustomize: true, outDir }, { APP_VERSION: '1.2.3' });

    const result = runPackaging(createDefaultRegistry(), config);

    expect(result.overlays).toEqual([
      path.join(outDir, 'base'),
      path.join(outDir, 'prod'),
      path.join(outDir, 'sim'),
    ]);
    expect(fs.readdirSync(outDir).sort()).toEqual(['base', 'prod', 'sim']);
    expect(Object.keys(readTree(outDir)).sort()).toEqual([
      path.join('base', 'kustomization.yml'),
      path.join('base', 'namespace.yml'),
      path.join('prod', 'kustomization.yml'),
      path.join('prod', 'sk-tracer.yml'),
      path.join('sim', 'kustomization.yml'),
      path.join('sim', 'sk-ctrl.yml'),
    ]);
  });

  it('should produce byte-identical output on reruns', () => {
    const buildDir = path.join(workDir, 'build');
    fs.mkdirSync(buildDir);
    fs.writeFileSync(path.join(buildDir, 'sk-vnode-image'), 'localhost:5000/sk-vnode:abc\n');
    const config = loadPackagingConfig({ outDir }, { BUILD_DIR: buildDir });

    runPackaging(createDefaultRegistry(), config);
    const first = readTree(outDir);
    runPackaging(createDefaultRegistry(), config);

    expect(readTree(outDir)).toEqual(first);
  });

  it('should not write anything when the run fails', () => {
    const config = loadPackagingConfig({ kustomize: true, outDir }, {});

    expect(() => runPackaging(createDefaultRegistry(), config)).toThrow(MissingRequiredConfigurationError);
    expect(fs.existsSync(outDir)).toBe(false);
  });
});
