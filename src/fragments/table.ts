/**
 * Three-level fragment table: test case → step → segment → code text.
 *
 * Test-case and step identifiers are stored and looked up upper-cased;
 * segment identifiers are matched exactly. Key order is insertion order.
 */

import type { FragmentData, FragmentEntry } from '../shared/types';

type SegmentLevel = Map<string, string>;
type StepLevel = Map<string, SegmentLevel>;

/** Normalize a TC or STEP identifier. */
export function normalizeId(id: string): string {
  return id.trim().toUpperCase();
}

export class FragmentTable {
  private readonly data = new Map<string, StepLevel>();

  private constructor(entries: Iterable<FragmentEntry>) {
    for (const entry of entries) {
      const tc = normalizeId(entry.tc);
      const step = normalizeId(entry.step);
      let steps = this.data.get(tc);
      if (!steps) {
        steps = new Map();
        this.data.set(tc, steps);
      }
      let segments = steps.get(step);
      if (!segments) {
        segments = new Map();
        steps.set(step, segments);
      }
      segments.set(entry.segment, entry.code);
    }
  }

  static empty(): FragmentTable {
    return new FragmentTable([]);
  }

  /** Later entries with the same key replace earlier ones. */
  static fromEntries(entries: Iterable<FragmentEntry>): FragmentTable {
    return new FragmentTable(entries);
  }

  static fromData(data: FragmentData): FragmentTable {
    const entries: FragmentEntry[] = [];
    for (const [tc, steps] of Object.entries(data)) {
      for (const [step, segments] of Object.entries(steps)) {
        for (const [segment, code] of Object.entries(segments)) {
          entries.push({ tc, step, segment, code });
        }
      }
    }
    return new FragmentTable(entries);
  }

  /**
   * Resolve a fragment. Returns null when any of the three levels is
   * absent; never throws.
   */
  lookup(tc: string, step: string, segment: string): string | null {
    const steps = this.data.get(normalizeId(tc));
    if (!steps) return null;
    const segments = steps.get(normalizeId(step));
    if (!segments) return null;
    return segments.get(segment) ?? null;
  }

  testCases(): string[] {
    return [...this.data.keys()];
  }

  steps(tc: string): string[] {
    const steps = this.data.get(normalizeId(tc));
    return steps ? [...steps.keys()] : [];
  }

  segments(tc: string, step: string): string[] {
    const segments = this.data.get(normalizeId(tc))?.get(normalizeId(step));
    return segments ? [...segments.keys()] : [];
  }

  /** All leaves in table order. */
  entries(): FragmentEntry[] {
    const result: FragmentEntry[] = [];
    for (const [tc, steps] of this.data) {
      for (const [step, segments] of steps) {
        for (const [segment, code] of segments) {
          result.push({ tc, step, segment, code });
        }
      }
    }
    return result;
  }

  /** Number of leaves. */
  get size(): number {
    let count = 0;
    for (const steps of this.data.values()) {
      for (const segments of steps.values()) {
        count += segments.size;
      }
    }
    return count;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /** Nested Maps in table order, for YAML serialization. */
  toMap(): Map<string, Map<string, Map<string, string>>> {
    const result = new Map<string, Map<string, Map<string, string>>>();
    for (const [tc, steps] of this.data) {
      const stepCopy = new Map<string, Map<string, string>>();
      for (const [step, segments] of steps) {
        stepCopy.set(step, new Map(segments));
      }
      result.set(tc, stepCopy);
    }
    return result;
  }
}
