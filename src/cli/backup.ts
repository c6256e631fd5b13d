/**
 * Backup and mirror directories for directory runs.
 *
 * Both live beside the source root: `<root>_backup_<YYYYMMDD_HHMMSS>` and
 * `<root>_stubbed_<YYYYMMDD_HHMMSS>`.
 */

import fs from 'fs';
import path from 'path';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local-time stamp, e.g. "20250521_232254". */
export function timestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function siblingDir(root: string, label: 'backup' | 'stubbed', stamp: string): string {
  const resolved = path.resolve(root);
  return `${resolved}_${label}_${stamp}`;
}

/** Copy a whole tree. The destination must not exist yet. */
export function copyTree(source: string, destination: string): void {
  fs.cpSync(source, destination, { recursive: true, errorOnExist: true, force: false });
}
