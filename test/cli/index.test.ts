import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseArgs, run } from '../../src/cli/index';

describe('parseArgs', () => {
  it('parses command and arguments', () => {
    const result = parseArgs(['node', 'stubweave', 'weave', 'src']);
    expect(result.command).toBe('weave');
    expect(result.args).toEqual(['src']);
  });

  it('returns empty command when no args', () => {
    const result = parseArgs(['node', 'stubweave']);
    expect(result.command).toBe('');
    expect(result.args).toEqual([]);
  });

  it('parses --key=value and --key value options', () => {
    const result = parseArgs(['node', 'stubweave', 'weave', 'src', '--mode=suffix', '--fragments', 'stubs.yaml']);
    expect(result.options).toEqual({ mode: 'suffix', fragments: 'stubs.yaml' });
    expect(result.args).toEqual(['src']);
  });

  it('does not let boolean flags consume the next argument', () => {
    const result = parseArgs(['node', 'stubweave', 'weave', '--no-backup', 'src', '--insert-all', '--json']);
    expect(result.args).toEqual(['src']);
    expect(result.flags).toEqual({ 'no-backup': true, 'insert-all': true, json: true });
  });

  it('parses short flags', () => {
    expect(parseArgs(['node', 'stubweave', '-h']).flags.h).toBe(true);
  });
});

describe('run', () => {
  let dir: string;
  let output: string[];
  const write = (msg: string): void => {
    output.push(msg);
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stubweave-cli-'));
    output = [];
    fs.mkdirSync(path.join(dir, 'src'));
    fs.writeFileSync(
      path.join(dir, 'src', 'main.c'),
      'int validate_data(int value) {\n    // TC001 STEP1 segment1\n    return value;\n}\n',
    );
    fs.writeFileSync(path.join(dir, 'stubs.yaml'), 'TC001:\n  STEP1:\n    segment1: |\n      if (value < 0) return -1;\n');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prints global help', async () => {
    expect(await run(['node', 'stubweave', 'help'], write, dir)).toBe(0);
    expect(output[0].split('\n')[0]).toBe('Usage: stubweave <command> [options]');
  });

  it('prints command help with --help', async () => {
    expect(await run(['node', 'stubweave', 'weave', '--help'], write, dir)).toBe(0);
    expect(output[0].startsWith('SYNOPSIS\n  stubweave weave <path>')).toBe(true);
  });

  it('rejects unknown commands', async () => {
    expect(await run(['node', 'stubweave', 'frobnicate'], write, dir)).toBe(2);
    expect(output).toEqual(['Unknown command: frobnicate. Run `stubweave help` for usage.']);
  });

  it('rejects an invalid mode', async () => {
    expect(await run(['node', 'stubweave', 'weave', 'src', '--mode=inplace'], write, dir)).toBe(2);
    expect(output).toEqual(['Error: Invalid --mode "inplace". Expected mirror or suffix.']);
  });

  it('weaves a single file beside itself', async () => {
    const code = await run(['node', 'stubweave', 'weave', 'src/main.c'], write, dir);

    expect(code).toBe(0);
    const stubbed = fs.readFileSync(path.join(dir, 'src', 'main.c.stub'), 'utf8');
    expect(stubbed).toBe(
      'int validate_data(int value) {\n    // TC001 STEP1 segment1\n    if (value < 0) return -1;  // inserted via stub\n    return value;\n}\n',
    );
  });

  it('weaves a directory in suffix mode without backup', async () => {
    const code = await run(['node', 'stubweave', 'weave', 'src', '--mode=suffix', '--no-backup', '--json'], write, dir);

    expect(code).toBe(0);
    const result = JSON.parse(output[0]);
    expect(result.stats).toEqual({ filesScanned: 1, filesUpdated: 1, stubsInserted: 1, filesFailed: 0 });
    expect(result.backupDir).toBeUndefined();
    expect(fs.readdirSync(dir).sort()).toEqual(['src', 'stubs.yaml']);
    expect(fs.existsSync(path.join(dir, 'src', 'main.c.stub'))).toBe(true);
  });

  it('reports a missing fragment table named on the command line', async () => {
    const code = await run(['node', 'stubweave', 'weave', 'src', '--fragments=nope.yaml'], write, dir);
    expect(code).toBe(2);
    expect(output[0]).toBe(`Error E201: Cannot read fragment table: ${path.join(dir, 'nope.yaml')}`);
  });

  it('applies --insert-all to files without anchors', async () => {
    fs.writeFileSync(path.join(dir, 'src', 'plain.c'), 'int z;\n');
    await run(['node', 'stubweave', 'weave', 'src/plain.c', '--insert-all'], write, dir);
    expect(fs.readFileSync(path.join(dir, 'src', 'plain.c.stub'), 'utf8')).toBe(
      'if (value < 0) return -1;  // inserted via stub\nint z;\n',
    );
  });

  it('reads the config file named by --config', async () => {
    fs.mkdirSync(path.join(dir, 'conf'));
    fs.writeFileSync(path.join(dir, 'conf', 'tool.yml'), 'fragments: ../stubs.yaml\ninsertion:\n  trace_marker: STUB\n');
    await run(['node', 'stubweave', 'weave', 'src/main.c', '--config=conf/tool.yml'], write, dir);
    expect(fs.readFileSync(path.join(dir, 'src', 'main.c.stub'), 'utf8')).toContain(
      '    if (value < 0) return -1;  // STUB\n',
    );
  });

  it('streams events with --verbose', async () => {
    await run(['node', 'stubweave', 'check', 'src/main.c', '--verbose'], write, dir);
    expect(output.filter((line) => line.includes('TC001 STEP1 segment1'))).toHaveLength(3);
  });
});
