/**
 * Wires config, fragment table, file I/O and processor for one CLI run.
 *
 * Built once per command invocation and passed to the command handlers, so
 * no component reaches for global state.
 */

import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { CONFIG_FILENAME, loadStubWeaveConfig, type ConfigWarning } from '../config';
import { FragmentTable, loadFragmentTable } from '../fragments';
import { FileIO, type OutputTarget } from '../io/file-io';
import { StubProcessor } from '../processor';
import { createLogger } from '../shared/logger';
import type { OutputMode, ResolvedConfig, StubEventListener } from '../shared/types';

export interface SessionOptions {
  cwd: string;
  configPath?: string;
  fragmentsPath?: string;
  mode?: OutputMode;
  insertAll?: boolean;
  noBackup?: boolean;
  onEvent?: StubEventListener;
  logger?: Logger;
}

export interface Session {
  config: ResolvedConfig;
  configWarnings: ConfigWarning[];
  /** Absolute fragment table path; null when no table file exists. */
  fragmentsPath: string | null;
  table: FragmentTable;
  io: FileIO;
  processor: StubProcessor;
  /** Target used for single files and `suffix` mode. */
  suffixTarget: OutputTarget;
}

/**
 * @throws StubWeaveError E201 when the fragment table cannot be read or parsed,
 *   or when an explicitly named table does not exist
 */
export function openSession(options: SessionOptions): Session {
  const log = options.logger ?? createLogger({ module: 'cli' });
  const configPath = path.resolve(options.cwd, options.configPath ?? CONFIG_FILENAME);
  const { config, warnings } = loadStubWeaveConfig(configPath);

  // Flags override file values
  if (options.mode) config.output.mode = options.mode;
  if (options.noBackup) config.output.backup = false;
  if (options.insertAll) config.insertion.no_anchor_mode = 'insert_all';

  const suffixTarget: OutputTarget = { kind: 'suffix', suffix: config.output.suffix };
  const io = new FileIO({
    fallbackEncodings: config.encoding.fallback,
    detectBytes: config.encoding.detect_bytes,
    confidenceThreshold: config.encoding.confidence_threshold,
    target: suffixTarget,
    logger: log.child({ module: 'file-io' }),
  });

  let fragmentsPath: string | null;
  let table: FragmentTable;
  if (options.fragmentsPath) {
    fragmentsPath = path.resolve(options.cwd, options.fragmentsPath);
    table = loadFragmentTable(fragmentsPath, io, log).table;
  } else {
    const candidate = path.resolve(path.dirname(configPath), config.fragments);
    if (fs.existsSync(candidate)) {
      fragmentsPath = candidate;
      table = loadFragmentTable(candidate, io, log).table;
    } else {
      log.info({ path: candidate }, 'No fragment table found, only traditional markers will resolve');
      fragmentsPath = null;
      table = FragmentTable.empty();
    }
  }

  const processor = new StubProcessor({
    table,
    io,
    options: {
      traceMarker: config.insertion.trace_marker,
      noAnchorMode: config.insertion.no_anchor_mode,
      extensions: config.sources.extensions,
      excludeDirs: config.sources.exclude_dirs,
    },
    logger: log.child({ module: 'processor' }),
    onEvent: options.onEvent,
  });

  return { config, configWarnings: warnings, fragmentsPath, table, io, processor, suffixTarget };
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
