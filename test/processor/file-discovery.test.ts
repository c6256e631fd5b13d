import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { findSourceFiles } from '../../src/processor/file-discovery';

describe('findSourceFiles', () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'stubweave-discovery-'));
    const files = ['b.c', 'a.C', 'notes.md', 'lib/x.c', 'lib/y.h', '.git/z.c', 'build/out.c', '.cache/w.c'];
    for (const rel of files) {
      const abs = path.join(root, rel);
      fs.mkdirSync(path.dirname(abs), { recursive: true });
      fs.writeFileSync(abs, '');
    }
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const rel = (files: string[]) => files.map((f) => path.relative(root, f));

  it('matches extensions case-insensitively and sorts results', () => {
    const files = findSourceFiles(root, { extensions: ['.c'], excludeDirs: [] });
    expect(rel(files)).toEqual(['a.C', 'b.c', 'build/out.c', 'lib/x.c']);
  });

  it('skips excluded directories', () => {
    const files = findSourceFiles(root, { extensions: ['.c', '.h'], excludeDirs: ['build'] });
    expect(rel(files)).toEqual(['a.C', 'b.c', 'lib/x.c', 'lib/y.h']);
  });

  it('returns nothing for a missing root', () => {
    expect(findSourceFiles(path.join(root, 'nope'), { extensions: ['.c'], excludeDirs: [] })).toEqual([]);
  });
});
