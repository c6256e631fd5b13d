import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { createRootLogger, createLogger } from '../../src/shared/logger';

function capture(): { stream: PassThrough; text: () => string } {
  const stream = new PassThrough();
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return { stream, text: () => Buffer.concat(chunks).toString() };
}

describe('logger', () => {
  it('creates child loggers with context', () => {
    const child = createLogger({ module: 'scanner', file: 'a.c' });
    expect(child.bindings()).toEqual(
      expect.objectContaining({ module: 'scanner', file: 'a.c' }),
    );
  });

  it('outputs structured JSON with a string level', async () => {
    const out = capture();
    const testLogger = createRootLogger(out.stream, 'info');
    testLogger.info({ file: 'main.c' }, 'hello world');

    await new Promise((resolve) => setTimeout(resolve, 50));

    const parsed = JSON.parse(out.text());
    expect(parsed.level).toBe('info');
    expect(parsed.msg).toBe('hello world');
    expect(parsed.file).toBe('main.c');
    expect(parsed.name).toBe('stubweave');
  });

  it('drops records below the configured level', async () => {
    const out = capture();
    const testLogger = createRootLogger(out.stream, 'warn');
    testLogger.info('not shown');
    testLogger.warn('shown');

    await new Promise((resolve) => setTimeout(resolve, 50));

    const lines = out.text().trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).msg).toBe('shown');
  });
});
