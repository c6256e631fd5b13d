// === Fragment Table ===

/** segment-id → code text */
export type SegmentMap = Record<string, string>;
/** step-id → segments */
export type StepMap = Record<string, SegmentMap>;
/** test-case-id → steps */
export type FragmentData = Record<string, StepMap>;

export interface FragmentKey {
  tc: string;
  step: string;
  segment: string;
}

export interface FragmentEntry extends FragmentKey {
  code: string;
}

// === Scanning ===

export type AnchorFormat = 'new' | 'traditional';

export interface InsertionRequest {
  /** Human-readable composite, e.g. "TC001 STEP1 segment1" or "TC001 STEP1". */
  id: string;
  /** Normalized test-case id, e.g. "TC001". */
  testCase: string;
  /** 1-based line after which the code goes; 0 means document start. */
  targetLine: number;
  /** 1-based line of the marker itself; 0 for document-start requests. */
  anchorLine: number;
  file: string;
  /** Resolved code text; null when no fragment was found. */
  code: string | null;
  format: AnchorFormat;
  /** Detection order within the file. */
  sequence: number;
}

export interface MissingAnchor {
  file: string;
  line: number;
  /** Anchor text as written in the source, e.g. "TC002 STEP2 unknown_segment". */
  anchor: string;
  testCase: string;
}

export interface MalformedAnchor {
  file: string;
  line: number;
  text: string;
}

export type NoAnchorMode = 'skip' | 'insert_all';

// === Events ===

export type StubEvent =
  | { type: 'anchor_found'; file: string; line: number; anchor: string; format: AnchorFormat }
  | { type: 'fragment_resolved'; file: string; line: number; anchor: string; lineCount: number }
  | { type: 'fragment_missing'; file: string; line: number; anchor: string }
  | { type: 'anchor_malformed'; file: string; line: number; text: string }
  | { type: 'file_written'; file: string; outputPath: string; inserted: number }
  | { type: 'file_failed'; file: string; error: string };

export type StubEventListener = (event: StubEvent) => void;

export type ProgressCallback = (current: number, total: number, file: string) => void;

// === Processing results ===

export interface FileProcessResult {
  success: boolean;
  message: string;
  insertedCount: number;
  outputPath?: string;
  missing: MissingAnchor[];
}

export interface ProcessingStatistics {
  filesScanned: number;
  filesUpdated: number;
  stubsInserted: number;
  filesFailed: number;
}

export interface TestCaseCounts {
  anchors: number;
  inserted: number;
}

export interface DirectoryResult {
  stats: ProcessingStatistics;
  errors: Array<{ file: string; error: string }>;
  missingAnchors: MissingAnchor[];
  byTestCase: Record<string, TestCaseCounts>;
  outputDir?: string;
  backupDir?: string;
}

// === Error Type ===

export interface ErrorContext {
  file?: string;
  line?: number;
}

export type StubWeaveErrorCode = 'E101' | 'E102' | 'E201' | 'E301' | 'E401';

export class StubWeaveError extends Error {
  readonly code: StubWeaveErrorCode;
  readonly userMessage?: string;
  readonly context: ErrorContext;
  readonly timestamp: string;

  constructor(opts: {
    code: StubWeaveErrorCode;
    message: string;
    userMessage?: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'StubWeaveError';
    this.code = opts.code;
    this.userMessage = opts.userMessage;
    this.context = opts.context ?? {};
    this.timestamp = new Date().toISOString();
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// === Tool Configuration (.stubweave.yml) ===

export type OutputMode = 'mirror' | 'suffix';

export interface StubWeaveConfig {
  fragments?: string;
  sources?: {
    extensions?: string[];
    exclude_dirs?: string[];
  };
  output?: {
    mode?: OutputMode;
    suffix?: string;
    backup?: boolean;
  };
  encoding?: {
    fallback?: string[];
    detect_bytes?: number;
    confidence_threshold?: number;
  };
  insertion?: {
    trace_marker?: string;
    no_anchor_mode?: NoAnchorMode;
  };
}

export type ResolvedConfig = {
  fragments: string;
  sources: Required<NonNullable<StubWeaveConfig['sources']>>;
  output: Required<NonNullable<StubWeaveConfig['output']>>;
  encoding: Required<NonNullable<StubWeaveConfig['encoding']>>;
  insertion: Required<NonNullable<StubWeaveConfig['insertion']>>;
};
