/**
 * StubProcessor: file- and directory-level orchestration.
 *
 * Every collaborator is a constructor argument. Failures stay local to the
 * file being processed; a directory run always visits every file.
 */

import fs from 'fs';
import type { Logger } from 'pino';
import { FragmentResolver } from '../anchors/resolver';
import { scanLines, type ScanResult } from '../anchors/scanner';
import type { FragmentTable } from '../fragments/table';
import { DEFAULT_TRACE_MARKER, insertIntoContent, joinContent, splitContent } from '../insertion/engine';
import type { FileIOAdapter, OutputTarget } from '../io/file-io';
import { findSourceFiles } from './file-discovery';
import { createLogger } from '../shared/logger';
import {
  StubWeaveError,
  errorMessage,
  type DirectoryResult,
  type FileProcessResult,
  type InsertionRequest,
  type MalformedAnchor,
  type MissingAnchor,
  type NoAnchorMode,
  type ProgressCallback,
  type StubEventListener,
} from '../shared/types';

export interface ProcessorOptions {
  traceMarker?: string;
  noAnchorMode?: NoAnchorMode;
  extensions?: string[];
  excludeDirs?: string[];
}

export interface StubProcessorDeps {
  table: FragmentTable;
  io: FileIOAdapter;
  options?: ProcessorOptions;
  logger?: Logger;
  onEvent?: StubEventListener;
}

export interface ContentResult {
  content: string;
  requests: InsertionRequest[];
  missing: MissingAnchor[];
  malformed: MalformedAnchor[];
  inserted: number;
}

export interface DirectoryOptions {
  /** Output target for every file; the adapter's default when omitted. */
  target?: OutputTarget;
  onProgress?: ProgressCallback;
}

interface FileRun extends FileProcessResult {
  requests: InsertionRequest[];
}

export class StubProcessor {
  private readonly resolver: FragmentResolver;
  private readonly io: FileIOAdapter;
  private readonly traceMarker: string;
  private readonly noAnchorMode: NoAnchorMode;
  private readonly extensions: string[];
  private readonly excludeDirs: string[];
  private readonly log: Logger;
  private readonly emit: StubEventListener;

  constructor(deps: StubProcessorDeps) {
    const options = deps.options ?? {};
    this.resolver = new FragmentResolver(deps.table);
    this.io = deps.io;
    this.traceMarker = options.traceMarker ?? DEFAULT_TRACE_MARKER;
    this.noAnchorMode = options.noAnchorMode ?? 'skip';
    this.extensions = options.extensions ?? ['.c'];
    this.excludeDirs = options.excludeDirs ?? ['.git', 'node_modules'];
    this.log = deps.logger ?? createLogger({ module: 'processor' });
    this.emit = deps.onEvent ?? (() => undefined);
  }

  /** Scan and rewrite a content string. Pure apart from events and logging. */
  processContent(content: string, file: string): ContentResult {
    const split = splitContent(content);
    const scan: ScanResult = scanLines(split.lines, file, this.resolver, {
      noAnchorMode: this.noAnchorMode,
      onEvent: this.emit,
      logger: this.log,
    });
    const { content: stubbed, inserted } = insertIntoContent(split, scan.requests, {
      traceMarker: this.traceMarker,
    });
    return {
      content: inserted > 0 ? joinContent(stubbed) : content,
      requests: scan.requests,
      missing: scan.missing,
      malformed: scan.malformed,
      inserted,
    };
  }

  /** Process one file and write the stubbed copy. Never throws. */
  processFile(filePath: string, target?: OutputTarget): FileProcessResult {
    const run = this.runFile(filePath, target);
    return {
      success: run.success,
      message: run.message,
      insertedCount: run.insertedCount,
      outputPath: run.outputPath,
      missing: run.missing,
    };
  }

  /**
   * Process every matching file under `root`.
   * @throws StubWeaveError E401 when `root` is not a directory
   */
  processDirectory(root: string, options: DirectoryOptions = {}): DirectoryResult {
    if (!isDirectory(root)) {
      throw new StubWeaveError({
        code: 'E401',
        message: `Not a directory: ${root}`,
        userMessage: 'Pass an existing source directory.',
        context: { file: root },
      });
    }

    const files = findSourceFiles(root, {
      extensions: this.extensions,
      excludeDirs: this.excludeDirs,
    });
    const result: DirectoryResult = {
      stats: { filesScanned: 0, filesUpdated: 0, stubsInserted: 0, filesFailed: 0 },
      errors: [],
      missingAnchors: [],
      byTestCase: {},
    };
    this.log.info({ root, files: files.length }, 'Processing directory');

    files.forEach((file, index) => {
      const run = this.runFile(file, options.target);
      const { stats } = result;
      stats.filesScanned++;
      if (run.success) {
        if (run.insertedCount > 0) stats.filesUpdated++;
        stats.stubsInserted += run.insertedCount;
      } else {
        stats.filesFailed++;
        result.errors.push({ file, error: run.message });
      }
      result.missingAnchors.push(...run.missing);

      for (const request of run.requests) {
        const counts = testCaseCounts(result, request.testCase);
        if (request.anchorLine > 0) counts.anchors++;
        if (run.success && request.code !== null) counts.inserted++;
      }
      for (const missing of run.missing) {
        testCaseCounts(result, missing.testCase).anchors++;
      }

      options.onProgress?.(index + 1, files.length, file);
    });

    this.log.info({ root, ...result.stats }, 'Directory processed');
    return result;
  }

  private runFile(filePath: string, target: OutputTarget | undefined): FileRun {
    const log = this.log.child({ file: filePath });
    try {
      const read = this.io.read(filePath);
      if (!read) {
        const message = `Cannot read file: ${filePath}`;
        log.error({ code: 'E101' }, message);
        this.emit({ type: 'file_failed', file: filePath, error: message });
        return { success: false, message, insertedCount: 0, missing: [], requests: [] };
      }

      const processed = this.processContent(read.content, filePath);
      const base = { missing: processed.missing, requests: processed.requests };
      if (processed.inserted === 0) {
        log.debug('No update needed');
        return { ...base, success: true, message: 'No update needed', insertedCount: 0 };
      }

      const outputPath = this.io.outputPathFor(filePath, target);

      if (!this.io.write(filePath, processed.content, read.encoding, target)) {
        const message = `Failed to write ${outputPath}`;
        log.error({ code: 'E102', outputPath }, message);
        this.emit({ type: 'file_failed', file: filePath, error: message });
        return { ...base, success: false, message, insertedCount: 0 };
      }

      this.emit({ type: 'file_written', file: filePath, outputPath, inserted: processed.inserted });
      return {
        ...base,
        success: true,
        message: `Inserted ${processed.inserted} stub(s) into ${outputPath}`,
        insertedCount: processed.inserted,
        outputPath,
      };
    } catch (err) {
      const message = `Unexpected error: ${errorMessage(err)}`;
      log.error({ code: 'E301', err }, 'File processing failed');
      this.emit({ type: 'file_failed', file: filePath, error: message });
      return { success: false, message, insertedCount: 0, missing: [], requests: [] };
    }
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function testCaseCounts(result: DirectoryResult, testCase: string): { anchors: number; inserted: number } {
  let counts = result.byTestCase[testCase];
  if (!counts) {
    counts = { anchors: 0, inserted: 0 };
    result.byTestCase[testCase] = counts;
  }
  return counts;
}
