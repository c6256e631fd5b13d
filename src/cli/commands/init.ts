/**
 * `stubweave init [dir]`: Write a starter fragment table and config.
 *
 * Writes, when absent:
 *   stubs.yaml       example fragment table
 *   .stubweave.yml   configuration with every default spelled out
 *
 * Existing files are left untouched.
 */

import fs from 'fs';
import path from 'path';
import { CONFIG_FILENAME } from '../../config';
import { color } from '../output';
import { errorMessage } from '../../shared/types';

// Templates ship with the package under templates/.
// At runtime __dirname is dist/cli/commands/ (or src/cli/commands/), three levels below the root.
function readTemplate(name: string): string {
  const packageRoot = path.join(__dirname, '../../..');
  return fs.readFileSync(path.join(packageRoot, 'templates', name), 'utf-8');
}

const FILES: Array<{ target: string; template: string }> = [
  { target: 'stubs.yaml', template: 'stubs.yaml' },
  { target: CONFIG_FILENAME, template: 'stubweave.yml' },
];

export async function runInit(
  dir: string = process.cwd(),
  write: (msg: string) => void = console.log,
): Promise<number> {
  try {
    const root = path.resolve(dir);
    fs.mkdirSync(root, { recursive: true });
    write(`stubweave: Initializing ${color.cyan(root)}\n`);

    for (const { target, template } of FILES) {
      const dest = path.join(root, target);
      if (fs.existsSync(dest)) {
        write(`  - ${target} exists, skipped`);
        continue;
      }
      fs.writeFileSync(dest, readTemplate(template), 'utf-8');
      write(`  ${color.green('✓')} ${target}`);
    }

    write('');
    write('Next: add anchors such as `// TC001 STEP1 segment1` to your C sources, then run `stubweave weave <dir>`.');
    return 0;
  } catch (err) {
    write(`Error: ${errorMessage(err)}`);
    return 2;
  }
}
