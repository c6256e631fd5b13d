/**
 * stubweave CLI entry point.
 *
 * Usage:
 *   stubweave weave <path>     Insert fragments into a file or source tree
 *   stubweave check <path>     Dry run, report missing anchors
 *   stubweave extract <path>   Rebuild a fragment table from stubbed sources
 *   stubweave init [dir]       Write starter files
 */

import path from 'path';
import { runWeave } from './commands/weave';
import { runCheck } from './commands/check';
import { runExtract } from './commands/extract';
import { runInit } from './commands/init';
import { getGlobalHelp, getCommandHelp } from './help';
import { formatEvent } from './output';
import { openSession, type Session } from './session';
import { StubWeaveError, errorMessage, type OutputMode } from '../shared/types';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'json', 'no-backup', 'insert-all', 'verbose'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        // --key value (peek ahead: if next arg isn't a flag, treat as value)
        const key = arg.slice(2);
        // Known boolean flags don't consume the next arg
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          options[key] = args[++i];
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

function parseMode(value: string | undefined): OutputMode | undefined | null {
  if (value === undefined) return undefined;
  return value === 'mirror' || value === 'suffix' ? value : null;
}

export async function run(
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
  cwd: string = process.cwd(),
): Promise<number> {
  const { command, args, flags, options } = parseArgs(argv);

  // Handle --help flag for any command
  if (flags.help || flags.h) {
    if (command) {
      const cmdHelp = getCommandHelp(command);
      if (cmdHelp) {
        write(cmdHelp);
        return 0;
      }
    }
    write(getGlobalHelp());
    return 0;
  }

  const mode = parseMode(options.mode);
  if (mode === null) {
    write(`Error: Invalid --mode "${options.mode}". Expected mirror or suffix.`);
    return 2;
  }

  const session = (): Session =>
    openSession({
      cwd,
      configPath: options.config,
      fragmentsPath: options.fragments,
      mode,
      insertAll: !!flags['insert-all'],
      noBackup: !!flags['no-backup'],
      onEvent: flags.verbose ? (event) => write(formatEvent(event)) : undefined,
    });

  const target = args[0] ? path.resolve(cwd, args[0]) : '';

  try {
    switch (command) {
      case 'weave':
        return await runWeave(session(), target, {
          json: !!flags.json,
          output: options.output ? path.resolve(cwd, options.output) : undefined,
        }, write);

      case 'check':
        return await runCheck(session(), target, { json: !!flags.json }, write);

      case 'extract':
        return await runExtract(session(), target, {
          output: options.output,
          json: !!flags.json,
          cwd,
        }, write);

      case 'init':
        return await runInit(target || cwd, write);

      case 'help':
      case '':
        write(getGlobalHelp());
        return 0;

      default:
        write(`Unknown command: ${command}. Run \`stubweave help\` for usage.`);
        return 2;
    }
  } catch (err) {
    if (err instanceof StubWeaveError) {
      write(`Error ${err.code}: ${err.message}`);
      if (err.userMessage) write(`  ${err.userMessage}`);
      return 2;
    }
    write(`Error: ${errorMessage(err)}`);
    return 2;
  }
}
