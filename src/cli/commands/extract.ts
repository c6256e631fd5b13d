/**
 * `stubweave extract <path>`: Rebuild a fragment table from stubbed sources.
 *
 * Reads every source file under <path>, collects the trace-marked lines under
 * each new-format anchor and writes them out as a fragment table YAML.
 */

import path from 'path';
import { color } from '../output';
import { isDirectory, type Session } from '../session';
import { writeFragmentTableFile } from '../../fragments';
import { collectFragments, extractStubs, type ExtractedStub } from '../../insertion/extract';
import { findSourceFiles } from '../../processor';
import { errorMessage } from '../../shared/types';

export const DEFAULT_EXTRACT_OUTPUT = 'stubs.extracted.yaml';

export interface ExtractCommandOptions {
  output?: string;
  json?: boolean;
  cwd?: string;
}

export async function runExtract(
  session: Session,
  target: string,
  options: ExtractCommandOptions = {},
  write: (msg: string) => void = console.log,
): Promise<number> {
  if (!target) {
    write('Error: No path specified. Usage: stubweave extract <path> [--output=FILE]');
    return 2;
  }

  try {
    const resolved = path.resolve(options.cwd ?? process.cwd(), target);
    const files = isDirectory(resolved)
      ? findSourceFiles(resolved, {
          extensions: session.config.sources.extensions,
          excludeDirs: session.config.sources.exclude_dirs,
        })
      : [resolved];

    const stubs: ExtractedStub[] = [];
    const unreadable: string[] = [];
    for (const file of files) {
      const read = session.io.read(file);
      if (!read) {
        unreadable.push(file);
        continue;
      }
      stubs.push(...extractStubs(read.content, file, { traceMarker: session.config.insertion.trace_marker }));
    }

    const { table, conflicts } = collectFragments(stubs);

    if (table.isEmpty()) {
      if (options.json) {
        write(JSON.stringify({ files: files.length, fragments: 0, conflicts: [], unreadable }, null, 2));
      } else {
        write(`stubweave: No stubbed fragments found under ${target}`);
      }
      return 1;
    }

    const outputPath = path.resolve(options.cwd ?? process.cwd(), options.output ?? DEFAULT_EXTRACT_OUTPUT);
    writeFragmentTableFile(outputPath, table);

    if (options.json) {
      write(JSON.stringify({
        files: files.length,
        fragments: table.size,
        output: outputPath,
        conflicts: conflicts.map((c) => ({ file: c.file, line: c.line, anchor: `${c.tc} ${c.step} ${c.segment}` })),
        unreadable,
      }, null, 2));
      return 0;
    }

    write(`stubweave: Extracted ${table.size} fragment${table.size !== 1 ? 's' : ''} from ${files.length} file${files.length !== 1 ? 's' : ''}`);
    write(`  Written to ${color.cyan(outputPath)}`);
    for (const c of conflicts) {
      write(`  ${color.yellow('conflict')} ${color.cyan(`${c.file}:${c.line}`)}  ${c.tc} ${c.step} ${c.segment} differs from an earlier copy; kept the first`);
    }
    for (const file of unreadable) {
      write(`  ${color.red('unreadable')} ${file}`);
    }
    return 0;
  } catch (err) {
    write(`Error: ${errorMessage(err)}`);
    return 2;
  }
}
