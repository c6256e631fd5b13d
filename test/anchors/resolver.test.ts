import { describe, it, expect } from 'vitest';
import { FragmentResolver } from '../../src/anchors/resolver';
import { FragmentTable } from '../../src/fragments/table';

describe('FragmentResolver', () => {
  const resolver = new FragmentResolver(
    FragmentTable.fromData({ TC001: { STEP1: { seg: 'x();\n' } } }),
  );

  it('delegates lookups to the table', () => {
    expect(resolver.lookup('tc001', 'step1', 'seg')).toBe('x();\n');
    expect(resolver.lookup('TC001', 'STEP1', 'SEG')).toBeNull();
  });

  it('defaults to an empty table', () => {
    expect(new FragmentResolver().lookup('TC001', 'STEP1', 'seg')).toBeNull();
  });

  it('normalizes test case keys', () => {
    expect(resolver.testCaseKey('tc042')).toBe('TC042');
  });
});

describe('FragmentResolver.readDirective', () => {
  const resolver = new FragmentResolver();

  it('reads single-line code and trims trailing space', () => {
    const lines = ['// TC001 STEP1:', '  //code:   call();   '];
    expect(resolver.readDirective(lines, 0)).toEqual({ code: 'call();', targetLine: 2, kind: 'single' });
  });

  it('ignores an empty single-line directive', () => {
    expect(resolver.readDirective(['// TC001 STEP1:', '// code:'], 0)).toBeNull();
  });

  it('reads a block up to the first closer', () => {
    const lines = ['// TC001 STEP1:', '/* code:', 'a();', '', 'b();', '*/', 'c();', '*/'];
    expect(resolver.readDirective(lines, 0)).toEqual({ code: 'a();\n\nb();', targetLine: 6, kind: 'block' });
  });

  it('reads a block closed on its opener line without looking further', () => {
    const lines = ['// TC001 STEP1:', '/* code: x = 1; */', 'int a;', 'int b;', '/* other */', 'int c;'];
    expect(resolver.readDirective(lines, 0)).toEqual({ code: 'x = 1;', targetLine: 2, kind: 'block' });
  });

  it('ignores an empty block closed on its opener line', () => {
    const lines = ['// TC001 STEP1:', '/* code: */', 'int a;', '/* other */'];
    expect(resolver.readDirective(lines, 0)).toBeNull();
  });

  it('returns null at end of input or for an unrelated next line', () => {
    expect(resolver.readDirective(['// TC001 STEP1:'], 0)).toBeNull();
    expect(resolver.readDirective(['// TC001 STEP1:', 'x = 1;'], 0)).toBeNull();
  });
});
