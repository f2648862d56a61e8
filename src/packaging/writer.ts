import * as fs from 'node:fs';
import * as path from 'node:path';
import { getComponentLogger } from '../core/logging/index.js';
import type { CompiledPackage } from './types.js';

const logger = getComponentLogger('package-writer');

/**
 * Write a compiled package under outDir. Staged manifests are written under
 * their numbered names and then renamed into place.
 */
export function writePackage(compiled: CompiledPackage, outDir: string): void {
  fs.mkdirSync(outDir, { recursive: true });

  for (const file of compiled.files) {
    writeFile(path.join(outDir, file.path), file.content);
  }

  for (const manifest of compiled.staged) {
    const stagedPath = path.join(outDir, manifest.stagedPath);
    const finalPath = path.join(outDir, manifest.finalPath);
    writeFile(stagedPath, manifest.content);
    fs.mkdirSync(path.dirname(finalPath), { recursive: true });
    fs.renameSync(stagedPath, finalPath);
    logger.debug('Moved manifest into overlay', { from: manifest.stagedPath, to: manifest.finalPath });
  }

  logger.info('Wrote manifests', {
    outDir,
    files: compiled.files.length + compiled.staged.length,
  });
}

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf8');
}
