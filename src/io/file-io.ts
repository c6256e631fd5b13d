/**
 * Encoding-tolerant file access for C sources and fragment tables.
 *
 * Reads try the detected encoding first, then a fallback list, and finally
 * decode as UTF-8 with replacement characters, so `read` never throws. A
 * single-byte guess decodes anything cleanly, so it only runs after the
 * multibyte fallbacks have failed.
 * Writes always go to a path derived from the source, through a temp file
 * and rename, so the source itself is never touched.
 */

import fs from 'fs';
import path from 'path';
import { analyse } from 'chardet';
import * as iconv from 'iconv-lite';
import type { Logger } from 'pino';
import { createLogger } from '../shared/logger';
import { errorMessage } from '../shared/types';

export interface ReadResult {
  content: string;
  /** Encoding the content was decoded with; reused when writing. */
  encoding: string;
}

export type OutputTarget =
  | { kind: 'suffix'; suffix: string }
  | { kind: 'mirror'; sourceRoot: string; outputRoot: string };

/** Returns an encoding name for a byte sample, or null when unsure. */
export type EncodingDetector = (sample: Buffer) => string | null;

export interface FileIOAdapter {
  read(filePath: string): ReadResult | null;
  write(filePath: string, content: string, encoding: string, target?: OutputTarget): boolean;
  outputPathFor(filePath: string, target?: OutputTarget): string;
}

export interface FileIOOptions {
  fallbackEncodings?: string[];
  detectBytes?: number;
  confidenceThreshold?: number;
  target?: OutputTarget;
  detect?: EncodingDetector;
  logger?: Logger;
}

export const DEFAULT_FALLBACK_ENCODINGS = ['utf-8', 'gb18030', 'latin1'];
export const DEFAULT_OUTPUT_TARGET: OutputTarget = { kind: 'suffix', suffix: '.stub' };

const REPLACEMENT_CHAR = '\uFFFD';
const UTF8_BOM = [0xef, 0xbb, 0xbf];

/** chardet-backed detector; the top guess must reach `threshold` (0-100). */
export function chardetDetector(threshold: number): EncodingDetector {
  return (sample) => {
    const [top] = analyse(sample);
    return top && top.confidence >= threshold ? top.name : null;
  };
}

/** Lower-case an encoding name and widen the Chinese subsets to GB18030. */
export function normalizeEncoding(name: string): string {
  const lower = name.toLowerCase();
  if (lower === 'gb2312' || lower === 'gbk') return 'gb18030';
  return lower;
}

function hasUtf8Bom(buf: Buffer): boolean {
  return buf.length >= 3 && UTF8_BOM.every((b, i) => buf[i] === b);
}

function isAscii(buf: Buffer): boolean {
  for (const byte of buf) {
    if (byte >= 0x80) return false;
  }
  return true;
}

const SINGLE_BYTE = /^(iso-8859-|windows-125|cp125|koi8-|latin|(us-)?ascii$)/;

export function isSingleByteEncoding(name: string): boolean {
  return SINGLE_BYTE.test(normalizeEncoding(name));
}

/** Build the ordered, de-duplicated candidate list. */
export function candidateEncodings(detected: string | null, fallback: string[]): string[] {
  let ordered: string[];
  if (!detected) {
    ordered = [...fallback];
  } else if (isSingleByteEncoding(detected)) {
    ordered = [...fallback.filter((name) => !isSingleByteEncoding(name)), detected, ...fallback];
  } else {
    ordered = [detected, ...fallback];
  }
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of ordered) {
    const normalized = normalizeEncoding(name);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(normalized);
  }
  return result;
}

/**
 * Decode a buffer with the first candidate that yields no replacement
 * characters, falling back to lossy UTF-8.
 */
export function decodeBuffer(
  buf: Buffer,
  candidates: string[],
  logger?: Logger,
): ReadResult {
  for (const encoding of candidates) {
    if (!iconv.encodingExists(encoding)) {
      logger?.debug({ encoding }, 'Skipping unsupported encoding');
      continue;
    }
    const content = iconv.decode(buf, encoding);
    if (!content.includes(REPLACEMENT_CHAR)) {
      return { content, encoding };
    }
    logger?.debug({ encoding }, 'Decode produced replacement characters, trying next encoding');
  }
  logger?.warn('All encodings failed, decoding as UTF-8 with replacement characters');
  return { content: iconv.decode(buf, 'utf-8'), encoding: 'utf-8' };
}

/** Path the stubbed copy of `filePath` is written to. */
export function deriveOutputPath(filePath: string, target: OutputTarget): string {
  if (target.kind === 'suffix') {
    return filePath + target.suffix;
  }
  const rel = path.relative(target.sourceRoot, filePath);
  return path.join(target.outputRoot, rel);
}

export class FileIO implements FileIOAdapter {
  private readonly fallback: string[];
  private readonly detectBytes: number;
  private readonly target: OutputTarget;
  private readonly detect: EncodingDetector;
  private readonly log: Logger;

  constructor(options: FileIOOptions = {}) {
    this.fallback = options.fallbackEncodings ?? DEFAULT_FALLBACK_ENCODINGS;
    this.detectBytes = options.detectBytes ?? 1024 * 1024;
    this.target = options.target ?? DEFAULT_OUTPUT_TARGET;
    this.detect = options.detect ?? chardetDetector(options.confidenceThreshold ?? 50);
    this.log = options.logger ?? createLogger({ module: 'file-io' });
  }

  read(filePath: string): ReadResult | null {
    let buf: Buffer;
    try {
      buf = fs.readFileSync(filePath);
    } catch (err) {
      this.log.warn({ file: filePath, err: errorMessage(err) }, 'Failed to read file');
      return null;
    }

    if (hasUtf8Bom(buf) || isAscii(buf)) {
      // iconv-lite strips the BOM on decode
      return { content: iconv.decode(buf, 'utf-8'), encoding: 'utf-8' };
    }

    let detected: string | null = null;
    try {
      detected = this.detect(buf.subarray(0, this.detectBytes));
    } catch (err) {
      this.log.warn({ file: filePath, err: errorMessage(err) }, 'Encoding detection failed');
    }

    const result = decodeBuffer(buf, candidateEncodings(detected, this.fallback), this.log);
    this.log.debug({ file: filePath, detected, encoding: result.encoding }, 'Read file');
    return result;
  }

  outputPathFor(filePath: string, target: OutputTarget = this.target): string {
    return deriveOutputPath(filePath, target);
  }

  write(
    filePath: string,
    content: string,
    encoding: string,
    target: OutputTarget = this.target,
  ): boolean {
    const outputPath = this.outputPathFor(filePath, target);
    if (path.resolve(outputPath) === path.resolve(filePath)) {
      this.log.error({ file: filePath }, 'Refusing to overwrite source file in place');
      return false;
    }

    const tmpPath = outputPath + '.stubweave-tmp';
    try {
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      fs.writeFileSync(tmpPath, this.encode(content, encoding, filePath));
      fs.renameSync(tmpPath, outputPath);
    } catch (err) {
      try {
        fs.rmSync(tmpPath, { force: true });
      } catch (cleanupErr) {
        this.log.debug({ file: tmpPath, err: errorMessage(cleanupErr) }, 'Temp file cleanup failed');
      }
      this.log.error({ file: filePath, outputPath, err: errorMessage(err) }, 'Failed to write file');
      return false;
    }

    this.log.info({ file: filePath, outputPath, encoding }, 'Wrote stubbed file');
    return true;
  }

  /** Characters the source encoding cannot hold become its substitute character. */
  private encode(content: string, encoding: string, filePath: string): Buffer {
    const normalized = normalizeEncoding(encoding);
    if (!iconv.encodingExists(normalized)) {
      this.log.warn({ file: filePath, encoding: normalized }, 'Unknown encoding, writing UTF-8');
      return iconv.encode(content, 'utf-8');
    }
    const buf = iconv.encode(content, normalized);
    if (iconv.decode(buf, normalized) !== content) {
      this.log.warn(
        { file: filePath, encoding: normalized },
        'Some characters are not representable in the source encoding and were replaced',
      );
    }
    return buf;
  }
}
