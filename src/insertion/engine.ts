/**
 * Insertion engine: splices resolved fragments into a line sequence.
 *
 * Requests are applied from the bottom of the file upwards so earlier line
 * numbers keep their meaning. Requests sharing a target line are applied in
 * reverse detection order, which leaves them in detection order in the output.
 */

import type { InsertionRequest } from '../shared/types';

export const DEFAULT_TRACE_MARKER = 'inserted via stub';

export interface InsertOptions {
  traceMarker?: string;
}

export interface InsertResult {
  lines: string[];
  /** Requests that were applied (null-code requests are dropped). */
  inserted: number;
}

/** Content split into lines, each keeping its own terminator. */
export interface SplitContent {
  lines: string[];
  /** Terminator of each line: "\n", "\r\n", or "" for a final unterminated line. */
  endings: string[];
  /** First terminator in the file; used where no neighbouring line has one. */
  eol: '\n' | '\r\n';
}

/** The comment appended to every inserted non-blank line. */
export function traceSuffix(marker: string = DEFAULT_TRACE_MARKER): string {
  return `  // ${marker}`;
}

export function splitContent(content: string): SplitContent {
  const lines: string[] = [];
  const endings: string[] = [];
  const terminator = /\r?\n/g;
  let start = 0;
  let match: RegExpExecArray | null;
  while ((match = terminator.exec(content)) !== null) {
    lines.push(content.slice(start, match.index));
    endings.push(match[0]);
    start = match.index + match[0].length;
  }
  if (start < content.length) {
    lines.push(content.slice(start));
    endings.push('');
  }
  const eol = endings[0] === '\r\n' ? '\r\n' : '\n';
  return { lines, endings, eol };
}

export function joinContent({ lines, endings }: SplitContent): string {
  return lines.map((line, i) => line + (endings[i] ?? '')).join('');
}

/**
 * Split fragment text into lines. The single trailing newline a YAML
 * literal block carries does not become an extra blank line.
 */
export function splitCodeLines(code: string): string[] {
  const lines = code.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Blank lines pass through untouched; others get indent and trace suffix. */
export function formatStubLine(line: string, indent: string, marker: string = DEFAULT_TRACE_MARKER): string {
  if (line.trim() === '') return line;
  return indent + line + traceSuffix(marker);
}

function leadingWhitespace(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : '';
}

/** Requests in application order: target descending, then detection order descending. */
export function orderForInsertion(requests: readonly InsertionRequest[]): InsertionRequest[] {
  return requests
    .filter((r) => r.code !== null)
    .sort((a, b) => b.targetLine - a.targetLine || b.sequence - a.sequence);
}

/** Apply requests to a copy of `lines`. */
export function insertIntoLines(
  lines: readonly string[],
  requests: readonly InsertionRequest[],
  options: InsertOptions = {},
): InsertResult {
  const split: SplitContent = { lines: [...lines], endings: lines.map(() => '\n'), eol: '\n' };
  const { content, inserted } = insertIntoContent(split, requests, options);
  return { lines: content.lines, inserted };
}

/**
 * Apply requests to split content. Inserted lines take the line ending of
 * the line they follow; original lines keep their own.
 */
export function insertIntoContent(
  split: SplitContent,
  requests: readonly InsertionRequest[],
  options: InsertOptions = {},
): { content: SplitContent; inserted: number } {
  const marker = options.traceMarker ?? DEFAULT_TRACE_MARKER;
  const lines = [...split.lines];
  const endings = [...split.endings];
  let inserted = 0;

  for (const request of orderForInsertion(requests)) {
    if (request.code === null) continue;
    const at = Math.max(0, Math.min(request.targetLine, lines.length));
    const indent = at > 0 ? leadingWhitespace(lines[at - 1]) : '';
    const block = splitCodeLines(request.code).map((line) => formatStubLine(line, indent, marker));
    const eol = (at > 0 ? endings[at - 1] : endings[0]) || split.eol;
    const blockEndings = block.map(() => eol);
    if (at === lines.length && (at === 0 || endings[at - 1] === '')) {
      // Appending after an unterminated last line: it gains the terminator instead
      if (at > 0) endings[at - 1] = eol;
      blockEndings[blockEndings.length - 1] = '';
    }
    lines.splice(at, 0, ...block);
    endings.splice(at, 0, ...blockEndings);
    inserted++;
  }

  return { content: { lines, endings, eol: split.eol }, inserted };
}

/** Content-level wrapper that keeps every line ending and the final newline. */
export function applyInsertions(
  content: string,
  requests: readonly InsertionRequest[],
  options: InsertOptions = {},
): { content: string; inserted: number } {
  const result = insertIntoContent(splitContent(content), requests, options);
  if (result.inserted === 0) return { content, inserted: 0 };
  return { content: joinContent(result.content), inserted: result.inserted };
}
