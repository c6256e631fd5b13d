/**
 * Fragment resolution for both anchor grammars.
 *
 * New-format anchors are looked up in the fragment table (TC and STEP
 * upper-cased, segment exact). Traditional markers carry their code in the
 * source itself, read from the line after the marker.
 */

import { FragmentTable, normalizeId } from '../fragments/table';

/** `// code: <text>` on the line after a traditional marker. */
const SINGLE_LINE_CODE = /\/\/\s*code:\s*(.*)$/;
/** `/* code:` opener on the line after a traditional marker. */
const BLOCK_CODE_OPENER = /\/\*\s*code:/;
/** `/* code: <text> *\/` closed on the opener line itself. */
const INLINE_BLOCK_CODE = /\/\*\s*code:(.*?)\*\//;
const BLOCK_CODE_CLOSER = '*/';

export interface DirectiveCode {
  code: string;
  /** 1-based line the code is inserted after. */
  targetLine: number;
  kind: 'single' | 'block';
}

export class FragmentResolver {
  constructor(private readonly table: FragmentTable = FragmentTable.empty()) {}

  get fragments(): FragmentTable {
    return this.table;
  }

  /** Total: any absent level yields null. */
  lookup(tc: string, step: string, segment: string): string | null {
    return this.table.lookup(tc, step, segment);
  }

  /** Canonical key for counters and reports, e.g. "TC001". */
  testCaseKey(tc: string): string {
    return normalizeId(tc);
  }

  /**
   * Read the code directive following a traditional marker at `markerIndex`
   * (0-based). A block closed on its opener line yields the text between
   * `code:` and the closer. Returns null when the next line carries no
   * directive, the directive is empty, or a block is never closed.
   */
  readDirective(lines: readonly string[], markerIndex: number): DirectiveCode | null {
    const nextIndex = markerIndex + 1;
    if (nextIndex >= lines.length) return null;
    const next = lines[nextIndex];

    const single = SINGLE_LINE_CODE.exec(next);
    if (single) {
      const code = single[1].trimEnd();
      if (!code) return null;
      return { code, targetLine: nextIndex + 1, kind: 'single' };
    }

    const inline = INLINE_BLOCK_CODE.exec(next);
    if (inline) {
      const code = inline[1].trim();
      if (!code) return null;
      return { code, targetLine: nextIndex + 1, kind: 'block' };
    }

    if (BLOCK_CODE_OPENER.test(next)) {
      const body: string[] = [];
      for (let j = nextIndex + 1; j < lines.length; j++) {
        if (lines[j].includes(BLOCK_CODE_CLOSER)) {
          if (body.length === 0) return null;
          return { code: body.join('\n'), targetLine: j + 1, kind: 'block' };
        }
        body.push(lines[j]);
      }
      return null;
    }

    return null;
  }
}
