/**
 * Fragment table loader.
 *
 * Expected YAML shape, leaves as literal block scalars:
 *
 *   TC001:
 *     STEP1:
 *       segment1: |
 *         if (value < 0) return -1;
 *
 * Non-string leaves and non-mapping levels are skipped with a warning.
 * Only an unreadable file, broken YAML, or a non-mapping root is fatal.
 */

import { parseDocument, isMap, isScalar, type YAMLMap } from 'yaml';
import type { Logger } from 'pino';
import { FragmentTable, normalizeId } from './table';
import type { FileIOAdapter } from '../io/file-io';
import { createLogger } from '../shared/logger';
import { StubWeaveError, type FragmentEntry } from '../shared/types';

export interface FragmentLoadWarning {
  /** Dotted key path, e.g. "TC001.STEP1.segment2". */
  path: string;
  message: string;
}

export interface LoadFragmentsResult {
  table: FragmentTable;
  warnings: FragmentLoadWarning[];
}

const defaultLogger = createLogger({ module: 'fragment-loader' });

function keyOf(key: unknown): string | null {
  if (isScalar(key)) {
    return key.value === null || key.value === undefined ? null : String(key.value);
  }
  return null;
}

function mapItems(node: YAMLMap): Array<{ key: string | null; value: unknown }> {
  return node.items.map((pair) => ({ key: keyOf(pair.key), value: pair.value }));
}

/**
 * Parse fragment table YAML text.
 * @throws StubWeaveError E201 on YAML syntax errors or a non-mapping root
 */
export function parseFragmentTable(
  yamlText: string,
  source = '<inline>',
  logger: Logger = defaultLogger,
): LoadFragmentsResult {
  const warnings: FragmentLoadWarning[] = [];
  const doc = parseDocument(yamlText.replace(/^\uFEFF/, ''));

  if (doc.errors.length > 0) {
    throw new StubWeaveError({
      code: 'E201',
      message: `Invalid fragment table YAML in ${source}: ${doc.errors[0].message}`,
      userMessage: 'Fix the YAML syntax of the fragment table.',
      context: { file: source },
      cause: doc.errors[0],
    });
  }

  const root = doc.contents;
  if (root === null || (isScalar(root) && root.value === null)) {
    logger.warn({ source }, 'Fragment table is empty');
    return { table: FragmentTable.empty(), warnings };
  }
  if (!isMap(root)) {
    throw new StubWeaveError({
      code: 'E201',
      message: `Fragment table root in ${source} must be a mapping of test cases`,
      context: { file: source },
    });
  }

  const entries: FragmentEntry[] = [];
  const seen = new Set<string>();

  for (const tcItem of mapItems(root)) {
    if (tcItem.key === null) continue;
    const tc = tcItem.key;
    if (!isMap(tcItem.value)) {
      warnings.push({ path: tc, message: 'Test case must map step ids to segments; skipped' });
      continue;
    }
    for (const stepItem of mapItems(tcItem.value)) {
      if (stepItem.key === null) continue;
      const step = stepItem.key;
      if (!isMap(stepItem.value)) {
        warnings.push({ path: `${tc}.${step}`, message: 'Step must map segment ids to code; skipped' });
        continue;
      }
      for (const segItem of mapItems(stepItem.value)) {
        if (segItem.key === null) continue;
        const segment = segItem.key;
        const leafPath = `${tc}.${step}.${segment}`;
        const leaf = segItem.value;
        if (!isScalar(leaf) || typeof leaf.value !== 'string') {
          warnings.push({ path: leafPath, message: 'Segment value must be a string; skipped' });
          continue;
        }
        const normalizedKey = `${normalizeId(tc)}\0${normalizeId(step)}\0${segment}`;
        if (seen.has(normalizedKey)) {
          warnings.push({ path: leafPath, message: 'Duplicate segment after id normalization; last one wins' });
        }
        seen.add(normalizedKey);
        entries.push({ tc, step, segment, code: leaf.value });
      }
    }
  }

  for (const w of warnings) {
    logger.warn({ source, path: w.path }, w.message);
  }

  const table = FragmentTable.fromEntries(entries);
  logger.info(
    { source, testCases: table.testCases().length, segments: table.size },
    'Loaded fragment table',
  );
  return { table, warnings };
}

/**
 * Read and parse a fragment table file through the I/O adapter, so
 * non-UTF-8 tables decode the same way sources do.
 * @throws StubWeaveError E201 when the file cannot be read or parsed
 */
export function loadFragmentTable(
  filePath: string,
  io: FileIOAdapter,
  logger: Logger = defaultLogger,
): LoadFragmentsResult {
  const read = io.read(filePath);
  if (!read) {
    throw new StubWeaveError({
      code: 'E201',
      message: `Cannot read fragment table: ${filePath}`,
      context: { file: filePath },
    });
  }
  return parseFragmentTable(read.content, filePath, logger);
}
