/**
 * CLI output formatting utilities.
 * Respects NO_COLOR and FORCE_COLOR per https://no-color.org/
 */

import path from 'path';
import type { ConfigWarning } from '../config';
import type {
  DirectoryResult,
  FileProcessResult,
  MissingAnchor,
  StubEvent,
  TestCaseCounts,
} from '../shared/types';

const NO_COLOR = !!process.env.NO_COLOR || process.env.TERM === 'dumb';
const FORCE_COLOR = !!process.env.FORCE_COLOR;

function useColor(): boolean {
  if (FORCE_COLOR) return true;
  if (NO_COLOR) return false;
  return process.stdout.isTTY ?? false;
}

const ESC = '\x1b[';

const codes = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  yellow: `${ESC}33m`,
  green: `${ESC}32m`,
  cyan: `${ESC}36m`,
  boldRed: `${ESC}1;31m`,
  boldWhite: `${ESC}1;37m`,
};

function wrap(code: string, text: string): string {
  return useColor() ? `${code}${text}${codes.reset}` : text;
}

export const color = {
  red: (t: string) => wrap(codes.boldRed, t),
  yellow: (t: string) => wrap(codes.yellow, t),
  green: (t: string) => wrap(codes.green, t),
  cyan: (t: string) => wrap(codes.cyan, t),
  dim: (t: string) => wrap(codes.dim, t),
  bold: (t: string) => wrap(codes.boldWhite, t),
};

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? 's' : ''}`;
}

function location(file: string, line: number, root?: string): string {
  const shown = root ? path.relative(root, file) || path.basename(file) : file;
  return color.cyan(`${shown}:${line}`);
}

export function formatConfigWarnings(warnings: ConfigWarning[]): string {
  return warnings.map((w) => `  ${color.yellow('warning')} ${w.message}`).join('\n');
}

export function formatMissingAnchors(missing: MissingAnchor[], root?: string): string {
  const lines = [`  ${color.yellow(plural(missing.length, 'missing anchor'))}:`];
  for (const m of missing) {
    lines.push(`    ${location(m.file, m.line, root)}  ${m.anchor}`);
  }
  return lines.join('\n');
}

export function formatTestCaseTable(byTestCase: Record<string, TestCaseCounts>): string {
  const ids = Object.keys(byTestCase).sort();
  const lines = ['  By test case:'];
  for (const id of ids) {
    const { anchors, inserted } = byTestCase[id];
    lines.push(`    ${id.padEnd(12)} ${String(anchors).padStart(4)} anchors  ${String(inserted).padStart(4)} inserted`);
  }
  return lines.join('\n');
}

export function formatFileResult(file: string, result: FileProcessResult): string {
  const lines: string[] = [];
  const status = result.success ? color.green('ok') : color.red('failed');
  lines.push(`stubweave: ${color.cyan(file)} ${status}`);
  lines.push(`  ${result.message}`);
  if (result.missing.length > 0) {
    lines.push(formatMissingAnchors(result.missing));
  }
  return lines.join('\n');
}

/**
 * Summary of a directory run.
 */
export function formatDirectorySummary(root: string, result: DirectoryResult): string {
  const { stats } = result;
  const lines: string[] = [];

  lines.push(`stubweave: Processed ${color.cyan(root)}`);
  lines.push('');
  lines.push('  Summary:');
  lines.push(`    Files scanned:   ${stats.filesScanned}`);
  lines.push(`    Files updated:   ${color.green(String(stats.filesUpdated))}`);
  lines.push(`    Stubs inserted:  ${stats.stubsInserted}`);
  lines.push(`    Files failed:    ${stats.filesFailed > 0 ? color.red(String(stats.filesFailed)) : '0'}`);

  if (result.backupDir) lines.push(`    Backup:          ${result.backupDir}`);
  if (result.outputDir) lines.push(`    Output:          ${result.outputDir}`);

  if (Object.keys(result.byTestCase).length > 0) {
    lines.push('');
    lines.push(formatTestCaseTable(result.byTestCase));
  }

  if (result.errors.length > 0) {
    lines.push('');
    lines.push(`  ${color.red(plural(result.errors.length, 'error'))}:`);
    for (const e of result.errors) {
      lines.push(`    ${color.cyan(path.relative(root, e.file) || e.file)}: ${e.error}`);
    }
  }

  if (result.missingAnchors.length > 0) {
    lines.push('');
    lines.push(formatMissingAnchors(result.missingAnchors, root));
    lines.push('');
    lines.push('  Add the missing segments to the fragment table and run again.');
  }

  return lines.join('\n');
}

/**
 * Simple progress bar for directory runs.
 */
export function progressBar(current: number, total: number, width = 40): string {
  if (NO_COLOR && !FORCE_COLOR) {
    return `  ${current}/${total} files processed`;
  }
  const ratio = total > 0 ? current / total : 0;
  const filled = Math.round(ratio * width);
  const empty = width - filled;
  return `    [${color.green('='.repeat(filled))}${' '.repeat(empty)}] ${current}/${total} files`;
}

/** One line per processor event, for --verbose. */
export function formatEvent(event: StubEvent): string {
  switch (event.type) {
    case 'anchor_found':
      return `  ${color.dim('anchor')}   ${location(event.file, event.line)}  ${event.anchor} (${event.format})`;
    case 'fragment_resolved':
      return `  ${color.green('resolved')} ${location(event.file, event.line)}  ${event.anchor}, ${plural(event.lineCount, 'line')}`;
    case 'fragment_missing':
      return `  ${color.yellow('missing')}  ${location(event.file, event.line)}  ${event.anchor}`;
    case 'anchor_malformed':
      return `  ${color.yellow('malformed')} ${location(event.file, event.line)}  ${event.text}`;
    case 'file_written':
      return `  ${color.green('wrote')}    ${event.outputPath} (${plural(event.inserted, 'stub')})`;
    case 'file_failed':
      return `  ${color.red('failed')}   ${event.file}: ${event.error}`;
  }
}
