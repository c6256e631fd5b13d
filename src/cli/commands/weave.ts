/**
 * `stubweave weave <path>`: Insert fragments into a file or a source tree.
 *
 * A single file is written beside itself with the configured suffix. A
 * directory is first copied to `<root>_backup_<ts>` (unless disabled), then
 * stubbed either into `<root>_stubbed_<ts>` (mirror) or beside each file
 * (suffix).
 */

import path from 'path';
import { copyTree, siblingDir, timestamp } from '../backup';
import { formatConfigWarnings, formatDirectorySummary, formatFileResult, progressBar } from '../output';
import { isDirectory, type Session } from '../session';
import type { OutputTarget } from '../../io/file-io';
import { errorMessage, type DirectoryResult } from '../../shared/types';

export interface WeaveOptions {
  json?: boolean;
  /** Mirror output directory; defaults to `<root>_stubbed_<ts>`. */
  output?: string;
  now?: Date;
}

export async function runWeave(
  session: Session,
  target: string,
  options: WeaveOptions = {},
  write: (msg: string) => void = console.log,
  clearLine: () => void = () => {
    if (process.stdout.isTTY) {
      process.stdout.write('\r\x1b[K');
    }
  },
): Promise<number> {
  if (!target) {
    write('Error: No path specified. Usage: stubweave weave <path>');
    return 2;
  }

  if (!options.json && session.configWarnings.length > 0) {
    write(formatConfigWarnings(session.configWarnings));
  }

  try {
    return weavePath(session, path.resolve(target), target, options, write, clearLine);
  } catch (err) {
    write(`Error: ${errorMessage(err)}`);
    return 2;
  }
}

function weavePath(
  session: Session,
  resolved: string,
  target: string,
  options: WeaveOptions,
  write: (msg: string) => void,
  clearLine: () => void,
): number {
  if (!isDirectory(resolved)) {
    const result = session.processor.processFile(resolved, session.suffixTarget);
    write(options.json ? JSON.stringify(result, null, 2) : formatFileResult(target, result));
    return result.success ? 0 : 1;
  }

  const stamp = timestamp(options.now);
  const { output } = session.config;

  let backupDir: string | undefined;
  if (output.backup) {
    backupDir = siblingDir(resolved, 'backup', stamp);
    copyTree(resolved, backupDir);
  }

  let outputTarget: OutputTarget = session.suffixTarget;
  let outputDir: string | undefined;
  if (output.mode === 'mirror') {
    outputDir = options.output ? path.resolve(options.output) : siblingDir(resolved, 'stubbed', stamp);
    // Unchanged files appear in the mirror too
    copyTree(resolved, outputDir);
    outputTarget = { kind: 'mirror', sourceRoot: resolved, outputRoot: outputDir };
  }

  if (!options.json) write(`stubweave: Weaving ${resolved}...`);
  const showProgress = !options.json && (process.stdout.isTTY ?? false);

  const result: DirectoryResult = session.processor.processDirectory(resolved, {
    target: outputTarget,
    onProgress: (current, total) => {
      if (showProgress) {
        clearLine();
        process.stdout.write(progressBar(current, total));
      }
    },
  });
  if (showProgress) clearLine();

  result.backupDir = backupDir;
  result.outputDir = outputDir;

  write(options.json ? JSON.stringify(result, null, 2) : formatDirectorySummary(resolved, result));
  return result.stats.filesFailed > 0 ? 1 : 0;
}
