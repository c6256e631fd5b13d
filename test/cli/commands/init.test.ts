import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { runInit } from '../../../src/cli/commands/init';
import { loadStubWeaveConfig } from '../../../src/config/loader';
import { parseFragmentTable } from '../../../src/fragments/loader';
import { captureOutput } from '../helpers';

describe('runInit', () => {
  let dir: string;

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes a loadable fragment table and config', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stubweave-init-'));
    const proj = path.join(dir, 'proj');
    const out = captureOutput();

    expect(await runInit(proj, out.write)).toBe(0);

    const { table, warnings } = parseFragmentTable(fs.readFileSync(path.join(proj, 'stubs.yaml'), 'utf8'));
    expect(warnings).toEqual([]);
    expect(table.lookup('TC001', 'STEP1', 'segment1')).toBe('if (value < 0) return -1;\n');
    expect(table.lookup('TC002', 'STEP1', 'mock_read')).toBe('return 0;\n');

    const config = loadStubWeaveConfig(path.join(proj, '.stubweave.yml'));
    expect(config.warnings).toEqual([]);
    expect(config.config.output.mode).toBe('mirror');
  });

  it('leaves existing files alone', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stubweave-init-'));
    fs.writeFileSync(path.join(dir, 'stubs.yaml'), 'TC009: {}\n');
    const out = captureOutput();

    await runInit(dir, out.write);

    expect(fs.readFileSync(path.join(dir, 'stubs.yaml'), 'utf8')).toBe('TC009: {}\n');
    expect(out.lines).toContain('  - stubs.yaml exists, skipped');
    expect(fs.existsSync(path.join(dir, '.stubweave.yml'))).toBe(true);
  });
});
