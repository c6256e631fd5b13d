import { describe, it, expect } from 'vitest';
import {
  formatConfigWarnings,
  formatDirectorySummary,
  formatEvent,
  formatFileResult,
  formatMissingAnchors,
  formatTestCaseTable,
  progressBar,
} from '../../src/cli/output';
import type { DirectoryResult } from '../../src/shared/types';

describe('formatConfigWarnings', () => {
  it('prints one line per warning', () => {
    expect(formatConfigWarnings([
      { field: 'output.mdoe', message: 'E502: Unknown key "mdoe". Did you mean "mode"?' },
    ])).toBe('  warning E502: Unknown key "mdoe". Did you mean "mode"?');
  });
});

describe('formatMissingAnchors', () => {
  it('shows paths relative to the root', () => {
    const text = formatMissingAnchors(
      [{ file: '/src/m2/b.c', line: 7, anchor: 'TC002 STEP9 segment1', testCase: 'TC002' }],
      '/src',
    );
    expect(text).toBe('  1 missing anchor:\n    m2/b.c:7  TC002 STEP9 segment1');
  });
});

describe('formatTestCaseTable', () => {
  it('sorts test cases and aligns counts', () => {
    expect(formatTestCaseTable({
      TC002: { anchors: 1, inserted: 0 },
      TC001: { anchors: 12, inserted: 3 },
    })).toBe([
      '  By test case:',
      '    TC001          12 anchors     3 inserted',
      '    TC002           1 anchors     0 inserted',
    ].join('\n'));
  });
});

describe('formatFileResult', () => {
  it('prints status and message', () => {
    expect(formatFileResult('a.c', {
      success: true,
      message: 'Inserted 2 stub(s) into a.c.stub',
      insertedCount: 2,
      outputPath: '/abs/a.c.stub',
      missing: [],
    })).toBe('stubweave: a.c ok\n  Inserted 2 stub(s) into a.c.stub');
  });
});

describe('formatDirectorySummary', () => {
  it('includes stats, output dirs and errors', () => {
    const result: DirectoryResult = {
      stats: { filesScanned: 3, filesUpdated: 1, stubsInserted: 2, filesFailed: 1 },
      errors: [{ file: '/src/bad.c', error: 'Cannot read file: /src/bad.c' }],
      missingAnchors: [],
      byTestCase: {},
      backupDir: '/src_backup_20250521_232254',
    };
    expect(formatDirectorySummary('/src', result).split('\n')).toEqual([
      'stubweave: Processed /src',
      '',
      '  Summary:',
      '    Files scanned:   3',
      '    Files updated:   1',
      '    Stubs inserted:  2',
      '    Files failed:    1',
      '    Backup:          /src_backup_20250521_232254',
      '',
      '  1 error:',
      '    bad.c: Cannot read file: /src/bad.c',
    ]);
  });
});

describe('formatEvent', () => {
  it('formats resolved fragments with their line count', () => {
    expect(formatEvent({ type: 'fragment_resolved', file: 'a.c', line: 3, anchor: 'TC001 STEP1 s', lineCount: 2 }))
      .toBe('  resolved a.c:3  TC001 STEP1 s, 2 lines');
  });

  it('formats written files', () => {
    expect(formatEvent({ type: 'file_written', file: 'a.c', outputPath: 'a.c.stub', inserted: 1 }))
      .toBe('  wrote    a.c.stub (1 stub)');
  });
});

describe('progressBar', () => {
  it('falls back to plain text without color', () => {
    expect(progressBar(3, 10)).toBe('  3/10 files processed');
  });
});
