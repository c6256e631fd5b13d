import fs from 'fs';
import path from 'path';

export interface DiscoveryOptions {
  /** Extensions including the dot, compared case-insensitively. */
  extensions: readonly string[];
  /** Directory names skipped at any depth. */
  excludeDirs: readonly string[];
}

/**
 * Recursively list source files under `root`, as absolute paths in sorted
 * order. Hidden directories and `excludeDirs` are not entered; unreadable
 * directories are skipped.
 */
export function findSourceFiles(root: string, options: DiscoveryOptions): string[] {
  const extensions = new Set(options.extensions.map((e) => e.toLowerCase()));
  const excluded = new Set(options.excludeDirs);
  const results: string[] = [];

  const walk = (dir: string): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return;
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || excluded.has(entry.name)) continue;
        walk(full);
      } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
        results.push(full);
      }
    }
  };

  walk(path.resolve(root));
  return results.sort();
}
