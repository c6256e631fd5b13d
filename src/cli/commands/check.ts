/**
 * `stubweave check <path>`: Dry run: report resolvable and missing anchors.
 *
 * Nothing is written. Exits 1 when any anchor is missing or any file fails.
 */

import path from 'path';
import { color, formatConfigWarnings, formatMissingAnchors } from '../output';
import { isDirectory, type Session } from '../session';
import { findSourceFiles } from '../../processor';
import { errorMessage, type AnchorFormat, type MissingAnchor } from '../../shared/types';

export interface CheckOptions {
  json?: boolean;
}

export interface CheckReport {
  files: number;
  resolved: Array<{ file: string; line: number; id: string; format: AnchorFormat }>;
  missing: MissingAnchor[];
  failed: Array<{ file: string; error: string }>;
}

export async function runCheck(
  session: Session,
  target: string,
  options: CheckOptions = {},
  write: (msg: string) => void = console.log,
): Promise<number> {
  if (!target) {
    write('Error: No path specified. Usage: stubweave check <path>');
    return 2;
  }

  try {
    const resolved = path.resolve(target);
    const files = isDirectory(resolved)
      ? findSourceFiles(resolved, {
          extensions: session.config.sources.extensions,
          excludeDirs: session.config.sources.exclude_dirs,
        })
      : [resolved];
    const report = checkFiles(session, files);

    if (options.json) {
      write(JSON.stringify(report, null, 2));
    } else {
      if (session.configWarnings.length > 0) write(formatConfigWarnings(session.configWarnings));
      write(formatCheckReport(target, report));
    }

    return report.missing.length > 0 || report.failed.length > 0 ? 1 : 0;
  } catch (err) {
    write(`Error: ${errorMessage(err)}`);
    return 2;
  }
}

export function checkFiles(session: Session, files: string[]): CheckReport {
  const report: CheckReport = { files: files.length, resolved: [], missing: [], failed: [] };
  for (const file of files) {
    const read = session.io.read(file);
    if (!read) {
      report.failed.push({ file, error: `Cannot read file: ${file}` });
      continue;
    }
    const result = session.processor.processContent(read.content, file);
    for (const r of result.requests) {
      report.resolved.push({ file: r.file, line: r.anchorLine, id: r.id, format: r.format });
    }
    report.missing.push(...result.missing);
  }
  return report;
}

function formatCheckReport(target: string, report: CheckReport): string {
  const lines: string[] = [];
  lines.push(`stubweave: Checking ${color.cyan(target)} (${report.files} file${report.files !== 1 ? 's' : ''})`);

  for (const r of report.resolved) {
    const where = r.line > 0 ? `:${r.line}` : ' (top)';
    lines.push(`  ${color.green('ok')}  ${color.cyan(`${r.file}${where}`)}  ${r.id}`);
  }
  for (const f of report.failed) {
    lines.push(`  ${color.red('failed')}  ${f.file}: ${f.error}`);
  }
  if (report.missing.length > 0) {
    lines.push(formatMissingAnchors(report.missing));
  }
  if (report.missing.length === 0 && report.failed.length === 0) {
    lines.push(`  ${color.green('All anchors resolve.')}`);
  }
  return lines.join('\n');
}
