import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { stubWeaveConfigSchema } from './schema';
import type { ResolvedConfig, StubWeaveConfig } from '../shared/types';

export const CONFIG_FILENAME = '.stubweave.yml';

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: ResolvedConfig;
  warnings: ConfigWarning[];
}

/** Default config used when the file is absent or fields are omitted. */
export const CONFIG_DEFAULTS: ResolvedConfig = {
  fragments: 'stubs.yaml',
  sources: {
    extensions: ['.c'],
    exclude_dirs: ['.git', 'node_modules'],
  },
  output: {
    mode: 'mirror',
    suffix: '.stub',
    backup: true,
  },
  encoding: {
    fallback: ['utf-8', 'gb18030', 'latin1'],
    detect_bytes: 1024 * 1024,
    confidence_threshold: 50,
  },
  insertion: {
    trace_marker: 'inserted via stub',
    no_anchor_mode: 'skip',
  },
};

/** Known keys per section, for "did you mean?" suggestions. */
const KNOWN_KEYS: Record<string, string[]> = {
  '': ['fragments', 'sources', 'output', 'encoding', 'insertion'],
  sources: ['extensions', 'exclude_dirs'],
  output: ['mode', 'suffix', 'backup'],
  encoding: ['fallback', 'detect_bytes', 'confidence_threshold'],
  insertion: ['trace_marker', 'no_anchor_mode'],
};

/**
 * Load and validate a .stubweave.yml configuration file.
 * Returns fully-populated config with defaults applied.
 *
 * - Missing file → defaults
 * - Empty file → defaults
 * - Invalid YAML → E501 warning + defaults
 * - Invalid values → E502 warning + field defaults
 * - Unknown keys → E502 warning with "did you mean?"
 */
export function loadStubWeaveConfig(filePath?: string): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  const resolvedPath = filePath ?? CONFIG_FILENAME;
  let rawContent: string | null = null;

  try {
    rawContent = fs.readFileSync(resolvedPath, 'utf-8');
  } catch {
    // File not found, use defaults
    return { config: applyDefaults({}), warnings };
  }

  if (!rawContent || rawContent.trim() === '') {
    return { config: applyDefaults({}), warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: applyDefaults({}), warnings };
  }

  // YAML that parses to null (e.g., just comments)
  if (parsed === null || parsed === undefined) {
    return { config: applyDefaults({}), warnings };
  }

  if (!isRecord(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E501: Config must be a YAML mapping. Using defaults.',
    });
    return { config: applyDefaults({}), warnings };
  }

  const result = stubWeaveConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: applyDefaults(result.data), warnings };
  }

  // Report every issue, drop the offending fields, and re-parse leniently
  const cleaned = structuredClone(parsed);
  for (const issue of result.error.issues) {
    const fieldPath = issue.path.map(String);
    if (issue.code === 'unrecognized_keys') {
      const section = fieldPath.join('.');
      for (const key of issue.keys) {
        const suggestion = findSimilarKey(key, KNOWN_KEYS[section] ?? []);
        const msg = suggestion
          ? `E502: Unknown key "${key}". Did you mean "${suggestion}"?`
          : `E502: Unknown key "${key}".`;
        warnings.push({ field: section ? `${section}.${key}` : key, message: msg });
        dropPath(cleaned, [...fieldPath, key]);
      }
    } else {
      warnings.push({
        field: fieldPath.join('.') || '_unknown',
        message: `E502: ${issue.message}. Using default for this field.`,
      });
      dropPath(cleaned, fieldPath.slice(0, 2));
    }
  }

  const retryResult = stubWeaveConfigSchema.safeParse(cleaned);
  if (retryResult.success) {
    return { config: applyDefaults(retryResult.data), warnings };
  }

  return { config: applyDefaults({}), warnings };
}

/** Fill every omitted field from CONFIG_DEFAULTS (user values take precedence). */
export function applyDefaults(config: StubWeaveConfig): ResolvedConfig {
  return {
    fragments: config.fragments ?? CONFIG_DEFAULTS.fragments,
    sources: { ...CONFIG_DEFAULTS.sources, ...config.sources },
    output: { ...CONFIG_DEFAULTS.output, ...config.output },
    encoding: { ...CONFIG_DEFAULTS.encoding, ...config.encoding },
    insertion: { ...CONFIG_DEFAULTS.insertion, ...config.insertion },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function dropPath(obj: Record<string, unknown>, path: string[]): void {
  if (path.length === 0) return;
  let current: Record<string, unknown> = obj;
  for (const segment of path.slice(0, -1)) {
    const next = current[segment];
    if (!isRecord(next)) return;
    current = next;
  }
  delete current[path[path.length - 1]];
}

function findSimilarKey(key: string, candidates: string[]): string | null {
  const lower = key.toLowerCase();
  for (const known of candidates) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}
