/**
 * Command-line entry point
 *
 * The only place that reads the packaging environment; everything below
 * receives a PackagingConfig.
 */

import { Command, CommanderError, Option } from 'commander';
import { createDefaultRegistry } from './applications/index.js';
import { DEFAULT_OUT_DIR, loadPackagingConfig, type PackagingOptions } from './core/config/index.js';
import { SimkubeManifestError } from './core/errors.js';
import { configureLogger, getComponentLogger, getLoggerConfigFromEnv } from './core/logging/index.js';
import type { ApplicationRegistry } from './core/registry/index.js';
import { runPackaging } from './packaging/index.js';

export const CLI_NAME = 'simkube-manifests';

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
} as const;

export interface CliOptions {
  kustomize: boolean;
  outDir: string;
  diffBase?: string;
  registryPrefix?: string;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createRegistry?: () => ApplicationRegistry;
}

const logger = getComponentLogger('cli');

export function createProgram(dependencies: CliDependencies = {}): Command {
  const env = dependencies.env ?? process.env;
  const createRegistry = dependencies.createRegistry ?? createDefaultRegistry;
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Package the simulation platform manifests for a kind dev cluster or a kustomize release')
    .addOption(new Option('--kustomize', 'Emit release kustomize overlays instead of the dev graph').default(false))
    .addOption(new Option('-o, --out-dir <dir>', 'Directory to write manifests to').default(DEFAULT_OUT_DIR))
    .addOption(new Option('--diff-base <file>', 'Previously rendered manifest stream to diff against'))
    .addOption(new Option('--registry-prefix <prefix>', 'Image registry for release images'))
    .action((options: CliOptions) => {
      const packagingOptions: PackagingOptions = {
        kustomize: options.kustomize,
        outDir: options.outDir,
        ...(options.diffBase !== undefined && { diffBase: options.diffBase }),
        ...(options.registryPrefix !== undefined && { registryPrefix: options.registryPrefix }),
      };
      const config = loadPackagingConfig(packagingOptions, env);
      const result = runPackaging(createRegistry(), config);
      logger.info('Packaging complete', {
        mode: result.mode,
        outDir: result.outDir,
        manifests: result.manifests.length,
        artifacts: result.artifacts,
      });
    });

  return program;
}

/**
 * Parse arguments (without the node and script entries) and run; resolves to
 * the process exit code. Logging is configured from the same environment.
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  configureLogger(getLoggerConfigFromEnv(dependencies.env ?? process.env));
  const program = createProgram(dependencies).exitOverride();

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof SimkubeManifestError) {
      logger.fatal(error.message, error, { code: error.code, ...error.context });
    } else if (error instanceof Error) {
      logger.fatal(error.message, error);
    } else {
      logger.fatal(String(error));
    }
    return EXIT_CODES.GENERAL_ERROR;
  }
}
