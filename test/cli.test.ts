import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createProgram, EXIT_CODES, runCli } from '../src/cli.js';
import { configureLogger, getComponentLogger } from '../src/core/logging/index.js';
import { ApplicationRegistry, defineApplication } from '../src/core/registry/index.js';

const QUIET = { SIMKUBE_LOG_LEVEL: 'silent' };

describe('CLI', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'simkube-cli-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    configureLogger({ level: 'silent' });
  });

  it('should expose the packaging flags', () => {
    const flags = createProgram().options.map((option) => option.flags);

    expect(flags).toEqual(['--kustomize', '-o, --out-dir <dir>', '--diff-base <file>', '--registry-prefix <prefix>']);
  });

  it('should write the dev graph by default', async () => {
    const outDir = path.join(workDir, 'dev');

    const code = await runCli(['--out-dir', outDir], {
      env: { ...QUIET, BUILD_DIR: path.join(workDir, 'build') },
    });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(fs.readdirSync(outDir).sort()).toEqual(['dag.mermaid', 'k8s.df', 'simkube.k8s.yaml']);
  });

  it('should write kustomize overlays with --kustomize', async () => {
    const outDir = path.join(workDir, 'release');

    const code = await runCli(['--kustomize', '-o', outDir, '--registry-prefix', 'registry.example.com/sim'], {
      env: { ...QUIET, APP_VERSION: '0.9.0' },
    });

    expect(code).toBe(0);
    expect(fs.readFileSync(path.join(outDir, 'sim', 'sk-ctrl.yml'), 'utf8')).toContain(
      'image: registry.example.com/sim/sk-ctrl:v0.9.0\n'
    );
  });

  it('should exit 1 when a required release input is missing', async () => {
    const outDir = path.join(workDir, 'release');

    const code = await runCli(['--kustomize', '-o', outDir], { env: QUIET });

    expect(code).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it('should exit 1 when the registry is invalid', async () => {
    const duplicate = defineApplication({ id: 'dup', namespace: 'simkube', image: { source: 'build' } });

    const code = await runCli(['-o', path.join(workDir, 'dev')], {
      env: QUIET,
      createRegistry: () => ApplicationRegistry.create([duplicate, duplicate]),
    });

    expect(code).toBe(1);
  });

  it('should configure logging from the environment it is given', async () => {
    const code = await runCli(['-o', path.join(workDir, 'dev')], {
      env: { SIMKUBE_LOG_LEVEL: 'error', BUILD_DIR: path.join(workDir, 'build') },
    });

    expect(code).toBe(0);
    expect(getComponentLogger('packaging').isLevelEnabled('error')).toBe(true);
    expect(getComponentLogger('packaging').isLevelEnabled('warn')).toBe(false);
  });
});
