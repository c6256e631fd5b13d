import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { openSession, type Session, type SessionOptions } from '../../src/cli/session';

export const MAIN_C = 'int validate_data(int value) {\n    // TC001 STEP1 segment1\n    return value;\n}\n';
export const PLAIN_C = 'int add(int a, int b) { return a + b; }\n';
export const MISSING_C = 'void f(void) {\n    // TC002 STEP1 segment1\n}\n';

export const STUBS_YAML = 'TC001:\n  STEP1:\n    segment1: |\n      if (value < 0) return -1;\n';

/** Temp workspace with a fragment table at its root. */
export function makeWorkspace(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stubweave-cmd-'));
  fs.writeFileSync(path.join(dir, 'stubs.yaml'), STUBS_YAML);
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(dir, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content);
  }
  return dir;
}

export function quietSession(cwd: string, overrides: Partial<SessionOptions> = {}): Session {
  return openSession({ cwd, logger: pino({ level: 'silent' }), ...overrides });
}

export function captureOutput(): { lines: string[]; write: (msg: string) => void } {
  const lines: string[] = [];
  return { lines, write: (msg: string) => lines.push(msg) };
}
