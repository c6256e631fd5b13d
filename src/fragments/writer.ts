/**
 * Fragment table writer.
 *
 * Serializes a FragmentTable back to YAML with every code leaf as a literal
 * block scalar, so whitespace inside fragments survives a load/save cycle.
 * Atomic file writes via temp file + rename.
 */

import fs from 'fs';
import { Document, Scalar, visit } from 'yaml';
import type { FragmentTable } from './table';

const HEADER = ' Fragment table generated by stubweave extract';

export function stringifyFragmentTable(table: FragmentTable, header = HEADER): string {
  const doc = new Document(table.toMap());
  if (header) doc.commentBefore = header;

  visit(doc, {
    Scalar(key, node) {
      if (key === 'value' && typeof node.value === 'string') {
        node.type = Scalar.BLOCK_LITERAL;
      }
    },
  });

  return doc.toString({ lineWidth: 0 });
}

/**
 * Write a fragment table to a file atomically.
 *
 * 1. Serialize the table
 * 2. Write to temp file (<path>.stubweave-tmp)
 * 3. Rename temp to target
 * 4. On error: delete temp file, re-throw
 */
export function writeFragmentTableFile(filePath: string, table: FragmentTable): void {
  const content = stringifyFragmentTable(table);
  const tmpPath = filePath + '.stubweave-tmp';
  try {
    fs.writeFileSync(tmpPath, content, 'utf8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}
