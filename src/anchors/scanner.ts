/**
 * Anchor scanner.
 *
 * Two grammars, mutually exclusive per file:
 *
 *   // TC001 STEP1 segment1 [free text]     new format, code from the table
 *   // TC001 STEP1:                          traditional, code from the next line
 *   // code: <text>   or   /* code: ... *\/
 *
 * Traditional markers are only considered when the new-format pass produced
 * no insertion request.
 */

import type { Logger } from 'pino';
import { FragmentResolver } from './resolver';
import { splitCodeLines } from '../insertion/engine';
import { createLogger } from '../shared/logger';
import type {
  InsertionRequest,
  MalformedAnchor,
  MissingAnchor,
  NoAnchorMode,
  StubEventListener,
} from '../shared/types';

/** `// TC<n> STEP<n>` not followed by a colon; the rest of the line is kept. */
const NEW_ANCHOR = /\/\/\s*(TC\d+\s+STEP\d+(?=\s|$).*)$/i;
const TRADITIONAL_MARKER = /\/\/\s*(TC\d+)\s+(STEP\d+):/i;

export interface ScanOptions {
  noAnchorMode?: NoAnchorMode;
  onEvent?: StubEventListener;
  logger?: Logger;
}

export interface ScanResult {
  /** Detection order. */
  requests: InsertionRequest[];
  missing: MissingAnchor[];
  malformed: MalformedAnchor[];
  /** Lines that looked like new-format anchors, well-formed or not. */
  candidates: number;
}

const defaultLogger = createLogger({ module: 'anchor-scanner' });

/** Scan `lines` for anchors. The input is not modified. */
export function scanLines(
  lines: readonly string[],
  file: string,
  resolver: FragmentResolver,
  options: ScanOptions = {},
): ScanResult {
  const log = options.logger ?? defaultLogger;
  const emit = options.onEvent ?? (() => undefined);
  const result: ScanResult = { requests: [], missing: [], malformed: [], candidates: 0 };

  scanNewFormat(lines, file, resolver, result, log, emit);

  if (result.candidates === 0 && options.noAnchorMode === 'insert_all') {
    queueWholeTable(file, resolver, result, log);
  }

  if (result.requests.length === 0) {
    scanTraditional(lines, file, resolver, result, log, emit);
  }

  log.debug(
    { file, requests: result.requests.length, missing: result.missing.length },
    'Scan complete',
  );
  return result;
}

function scanNewFormat(
  lines: readonly string[],
  file: string,
  resolver: FragmentResolver,
  result: ScanResult,
  log: Logger,
  emit: StubEventListener,
): void {
  lines.forEach((line, index) => {
    const match = NEW_ANCHOR.exec(line);
    if (!match) return;
    result.candidates++;
    const lineNo = index + 1;
    const tokens = match[1].trim().split(/\s+/);

    if (tokens.length < 3) {
      const text = match[1].trim();
      log.debug({ file, line: lineNo, text }, 'Malformed anchor skipped');
      result.malformed.push({ file, line: lineNo, text });
      emit({ type: 'anchor_malformed', file, line: lineNo, text });
      return;
    }

    const [tc, step, segment] = tokens;
    const anchor = `${tc} ${step} ${segment}`;
    const testCase = resolver.testCaseKey(tc);
    emit({ type: 'anchor_found', file, line: lineNo, anchor, format: 'new' });

    const code = resolver.lookup(tc, step, segment);
    if (!code) {
      log.warn({ file, line: lineNo, anchor }, 'No fragment for anchor');
      result.missing.push({ file, line: lineNo, anchor, testCase });
      emit({ type: 'fragment_missing', file, line: lineNo, anchor });
      return;
    }

    result.requests.push({
      id: anchor,
      testCase,
      targetLine: lineNo,
      anchorLine: lineNo,
      file,
      code,
      format: 'new',
      sequence: result.requests.length,
    });
    emit({
      type: 'fragment_resolved',
      file,
      line: lineNo,
      anchor,
      lineCount: splitCodeLines(code).length,
    });
  });
}

function queueWholeTable(
  file: string,
  resolver: FragmentResolver,
  result: ScanResult,
  log: Logger,
): void {
  for (const entry of resolver.fragments.entries()) {
    if (!entry.code) continue;
    result.requests.push({
      id: `${entry.tc} ${entry.step} ${entry.segment}`,
      testCase: entry.tc,
      targetLine: 0,
      anchorLine: 0,
      file,
      code: entry.code,
      format: 'new',
      sequence: result.requests.length,
    });
  }
  if (result.requests.length > 0) {
    log.info({ file, count: result.requests.length }, 'No anchors found, inserting whole table at top');
  }
}

function scanTraditional(
  lines: readonly string[],
  file: string,
  resolver: FragmentResolver,
  result: ScanResult,
  log: Logger,
  emit: StubEventListener,
): void {
  lines.forEach((line, index) => {
    const match = TRADITIONAL_MARKER.exec(line);
    if (!match) return;
    const lineNo = index + 1;
    const anchor = `${match[1]} ${match[2]}`;
    emit({ type: 'anchor_found', file, line: lineNo, anchor, format: 'traditional' });

    const directive = resolver.readDirective(lines, index);
    if (!directive) {
      log.debug({ file, line: lineNo, anchor }, 'Traditional marker without code directive');
      return;
    }

    result.requests.push({
      id: anchor,
      testCase: resolver.testCaseKey(match[1]),
      targetLine: directive.targetLine,
      anchorLine: lineNo,
      file,
      code: directive.code,
      format: 'traditional',
      sequence: result.requests.length,
    });
    emit({
      type: 'fragment_resolved',
      file,
      line: lineNo,
      anchor,
      lineCount: splitCodeLines(directive.code).length,
    });
  });
}
