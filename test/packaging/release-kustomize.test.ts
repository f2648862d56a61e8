import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { createDefaultRegistry } from '../../src/applications/index.js';
import { loadPackagingConfig } from '../../src/core/config/index.js';
import { MissingRequiredConfigurationError } from '../../src/core/errors.js';
import { parseYamlStream } from '../../src/core/serialization/index.js';
import { compilePackage, stagedManifestName } from '../../src/packaging/index.js';

const releaseConfig = loadPackagingConfig(
  { kustomize: true, outDir: 'out' },
  { BUILD_DIR: '/nonexistent', APP_VERSION: '1.2.3' }
);

describe('Release kustomize packaging', () => {
  it('should number staged manifests with four digits', () => {
    expect(stagedManifestName(0, 'sk-tracer')).toBe('0000-sk-tracer.k8s.yaml');
    expect(stagedManifestName(12, 'sk-ctrl')).toBe('0012-sk-ctrl.k8s.yaml');
  });

  it('should stage release applications and move them into their overlays', () => {
    const compiled = compilePackage(createDefaultRegistry(), releaseConfig);

    expect(compiled.mode).toBe('release-kustomize');
    expect(compiled.overlays).toEqual(['base', 'prod', 'sim']);
    expect(compiled.artifacts).toEqual([]);
    expect(compiled.staged.map(({ stagedPath, finalPath }) => ({ stagedPath, finalPath }))).toEqual([
      { stagedPath: '0000-sk-tracer.k8s.yaml', finalPath: path.join('prod', 'sk-tracer.yml') },
      { stagedPath: '0001-sk-ctrl.k8s.yaml', finalPath: path.join('sim', 'sk-ctrl.yml') },
    ]);
  });

  it('should write a kustomization for base and each overlay', () => {
    const compiled = compilePackage(createDefaultRegistry(), releaseConfig);
    const content = (file: string): string | undefined => compiled.files.find((entry) => entry.path === file)?.content;

    expect(compiled.files.map((file) => file.path)).toEqual([
      path.join('base', 'namespace.yml'),
      path.join('base', 'kustomization.yml'),
      path.join('prod', 'kustomization.yml'),
      path.join('sim', 'kustomization.yml'),
    ]);
    expect(content(path.join('base', 'namespace.yml'))).toBe(
      '---\napiVersion: v1\nkind: Namespace\nmetadata:\n  name: simkube\n'
    );
    expect(content(path.join('base', 'kustomization.yml'))).toBe(
      'apiVersion: kustomize.config.k8s.io/v1beta1\nkind: Kustomization\nresources:\n  - namespace.yml\n'
    );
    expect(content(path.join('prod', 'kustomization.yml'))).toBe(
      'apiVersion: kustomize.config.k8s.io/v1beta1\nkind: Kustomization\nresources:\n  - ../base\n  - sk-tracer.yml\n'
    );
    expect(content(path.join('sim', 'kustomization.yml'))).toBe(
      'apiVersion: kustomize.config.k8s.io/v1beta1\nkind: Kustomization\nresources:\n  - ../base\n  - sk-ctrl.yml\n'
    );
  });

  it('should use versioned registry images without kind-specific settings', () => {
    const compiled = compilePackage(createDefaultRegistry(), releaseConfig);
    const ctrl = compiled.staged.find((manifest) => manifest.stagedPath === '0001-sk-ctrl.k8s.yaml');

    expect(ctrl?.content).toContain('image: quay.io/appliedcomputing/sk-ctrl:v1.2.3\n');
    for (const manifest of compiled.staged) {
      expect(manifest.content).not.toContain('nodeSelector');
      expect(manifest.content).not.toContain('SYS_PTRACE');
    }
  });

  it('should tell the tracer which deployment owns its pod', () => {
    const compiled = compilePackage(createDefaultRegistry(), releaseConfig);
    const tracer = compiled.staged.find((manifest) => manifest.stagedPath === '0000-sk-tracer.k8s.yaml');
    const tracerDeployment = parseYamlStream(tracer?.content ?? '').find(
      (document) => typeof document === 'object' && document !== null && 'kind' in document && document.kind === 'Deployment'
    );

    expect(tracerDeployment).toHaveProperty(
      ['spec', 'template', 'spec', 'containers', 0, 'env'],
      [
        { name: 'RUST_BACKTRACE', value: '1' },
        { name: 'POD_OWNER', value: 'sk-tracer-depl' },
      ]
    );
  });

  it('should fail before rendering without an application version', () => {
    const unversioned = loadPackagingConfig({ kustomize: true }, {});

    expect(() => compilePackage(createDefaultRegistry(), unversioned)).toThrow(MissingRequiredConfigurationError);
  });
});
