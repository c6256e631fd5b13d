/**
 * Reverse extraction: recover fragments from an already stubbed file.
 *
 * Lines carrying the trace suffix directly below a new-format anchor are the
 * fragment that was inserted there. Stripping the anchor's indentation and the
 * suffix yields the fragment text as authored.
 *
 * Blank lines are inserted without the suffix, so only blank lines between
 * two marked lines are recovered. Blank lines that ended a fragment cannot be
 * told apart from the source's own and are dropped: `"a\n\n"` comes back as
 * `"a\n"`.
 */

import type { Logger } from 'pino';
import { DEFAULT_TRACE_MARKER, splitContent, traceSuffix } from './engine';
import { FragmentTable, normalizeId } from '../fragments/table';
import { createLogger } from '../shared/logger';
import type { FragmentEntry } from '../shared/types';

const ANCHOR = /\/\/\s*(TC\d+\s+STEP\d+(?=\s|$).*)$/i;

export interface ExtractedStub extends FragmentEntry {
  /** 1-based line of the anchor. */
  line: number;
  file: string;
}

export interface ExtractOptions {
  traceMarker?: string;
  logger?: Logger;
}

const defaultLogger = createLogger({ module: 'extract' });

/** Remove the trace suffix; null when the line is not marked. */
export function stripTraceSuffix(line: string, marker: string = DEFAULT_TRACE_MARKER): string | null {
  const suffix = traceSuffix(marker);
  return line.endsWith(suffix) ? line.slice(0, -suffix.length) : null;
}

export function extractStubs(content: string, file: string, options: ExtractOptions = {}): ExtractedStub[] {
  const marker = options.traceMarker ?? DEFAULT_TRACE_MARKER;
  const log = options.logger ?? defaultLogger;
  const { lines } = splitContent(content);
  const stubs: ExtractedStub[] = [];

  for (let i = 0; i < lines.length; i++) {
    const match = ANCHOR.exec(lines[i]);
    if (!match) continue;
    const tokens = match[1].trim().split(/\s+/);
    if (tokens.length < 3) continue;

    const indent = /^[ \t]*/.exec(lines[i])?.[0] ?? '';
    const body: string[] = [];
    let pendingBlank: string[] = [];
    for (let j = i + 1; j < lines.length; j++) {
      const stripped = stripTraceSuffix(lines[j], marker);
      if (stripped !== null) {
        body.push(...pendingBlank, stripped.startsWith(indent) ? stripped.slice(indent.length) : stripped);
        pendingBlank = [];
      } else if (lines[j].trim() === '') {
        // kept only if another marked line follows
        pendingBlank.push(lines[j]);
      } else {
        break;
      }
    }

    if (body.length === 0) {
      log.debug({ file, line: i + 1 }, 'Anchor has no stubbed lines');
      continue;
    }
    const [tc, step, segment] = tokens;
    stubs.push({ tc, step, segment, code: body.join('\n') + '\n', line: i + 1, file });
  }

  return stubs;
}

export interface CollectResult {
  table: FragmentTable;
  /** Keys seen more than once with different code; the first occurrence wins. */
  conflicts: ExtractedStub[];
}

/** Merge extracted stubs into a table in discovery order. */
export function collectFragments(stubs: readonly ExtractedStub[]): CollectResult {
  const seen = new Map<string, string>();
  const entries: FragmentEntry[] = [];
  const conflicts: ExtractedStub[] = [];

  for (const stub of stubs) {
    const key = `${normalizeId(stub.tc)}\0${normalizeId(stub.step)}\0${stub.segment}`;
    const previous = seen.get(key);
    if (previous === undefined) {
      seen.set(key, stub.code);
      entries.push({ tc: stub.tc, step: stub.step, segment: stub.segment, code: stub.code });
    } else if (previous !== stub.code) {
      conflicts.push(stub);
    }
  }

  return { table: FragmentTable.fromEntries(entries), conflicts };
}
