import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { runCheck } from '../../../src/cli/commands/check';
import { captureOutput, makeWorkspace, quietSession, MAIN_C, MISSING_C } from '../helpers';

describe('runCheck', () => {
  let dir: string;

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports resolved and missing anchors without writing', async () => {
    dir = makeWorkspace({ 'src/main.c': MAIN_C, 'src/missing.c': MISSING_C });
    const src = path.join(dir, 'src');
    const out = captureOutput();

    const code = await runCheck(quietSession(dir), src, { json: true }, out.write);

    expect(code).toBe(1);
    expect(JSON.parse(out.lines[0])).toEqual({
      files: 2,
      resolved: [{ file: path.join(src, 'main.c'), line: 2, id: 'TC001 STEP1 segment1', format: 'new' }],
      missing: [{ file: path.join(src, 'missing.c'), line: 2, anchor: 'TC002 STEP1 segment1', testCase: 'TC002' }],
      failed: [],
    });
    expect(fs.readdirSync(src).sort()).toEqual(['main.c', 'missing.c']);
  });

  it('exits 0 when every anchor resolves', async () => {
    dir = makeWorkspace({ 'main.c': MAIN_C });
    const file = path.join(dir, 'main.c');
    const out = captureOutput();

    expect(await runCheck(quietSession(dir), file, {}, out.write)).toBe(0);
    expect(out.lines[0].split('\n')).toEqual([
      `stubweave: Checking ${file} (1 file)`,
      `  ok  ${file}:2  TC001 STEP1 segment1`,
      '  All anchors resolve.',
    ]);
  });

  it('counts unreadable files as failures', async () => {
    dir = makeWorkspace({});
    const file = path.join(dir, 'absent.c');
    const out = captureOutput();

    expect(await runCheck(quietSession(dir), file, { json: true }, out.write)).toBe(1);
    expect(JSON.parse(out.lines[0]).failed).toEqual([{ file, error: `Cannot read file: ${file}` }]);
  });
});
