/**
 * CLI help text for global and per-command --help output.
 *
 * Each subcommand help follows a consistent structure:
 *   SYNOPSIS, DESCRIPTION, FLAGS, EXAMPLES
 */

const COMMAND_HELP: Record<string, string> = {
  weave: `
SYNOPSIS
  stubweave weave <path> [--fragments=PATH] [--config=PATH] [--mode=mirror|suffix]
                         [--output=DIR] [--no-backup] [--insert-all] [--verbose] [--json]

DESCRIPTION
  Insert fragments from the fragment table at every anchor in a C file or
  in every source file under a directory. Sources are never modified.
  A single file is written beside itself with the configured suffix.
  A directory is backed up to <dir>_backup_<timestamp> first, then stubbed
  into <dir>_stubbed_<timestamp> (mirror) or beside each file (suffix).

FLAGS
  --fragments=PATH    Fragment table YAML (default: stubs.yaml next to the config)
  --config=PATH       Configuration file (default: .stubweave.yml)
  --mode=MODE         mirror or suffix (directory runs only)
  --output=DIR        Mirror output directory
  --no-backup         Skip the backup copy of the source tree
  --insert-all        Files without anchors receive every fragment at the top
  --verbose           Print each anchor and file event
  --json              Output results as JSON

EXAMPLES
  stubweave weave src/
  stubweave weave src/module1/Demo1.c --fragments=tests/stubs.yaml
  stubweave weave src/ --mode=suffix --no-backup
`.trim(),

  check: `
SYNOPSIS
  stubweave check <path> [--fragments=PATH] [--config=PATH] [--insert-all] [--json]

DESCRIPTION
  Dry run. Resolve every anchor in a file or directory against the fragment
  table and report which resolve and which are missing. Nothing is written.
  Exits 1 when an anchor is missing or a file cannot be read.

FLAGS
  --fragments=PATH    Fragment table YAML
  --config=PATH       Configuration file
  --insert-all        Report whole-table insertion for files without anchors
  --json              Output results as JSON

EXAMPLES
  stubweave check src/
  stubweave check src/module2/Demo2.c --json
`.trim(),

  extract: `
SYNOPSIS
  stubweave extract <path> [--output=FILE] [--config=PATH] [--json]

DESCRIPTION
  Rebuild a fragment table from already stubbed sources. The trace-marked
  lines under each anchor are collected, their indentation and trace comment
  removed, and written out as literal YAML blocks.

FLAGS
  --output=FILE       Fragment table to write (default: stubs.extracted.yaml)
  --config=PATH       Configuration file (for the trace marker and extensions)
  --json              Output results as JSON

EXAMPLES
  stubweave extract src_stubbed_20250521_232254/
  stubweave extract build/ --output=recovered.yaml
`.trim(),

  init: `
SYNOPSIS
  stubweave init [dir]

DESCRIPTION
  Write an example fragment table (stubs.yaml) and a configuration file
  (.stubweave.yml) listing every default. Existing files are left alone.

EXAMPLES
  stubweave init
  stubweave init tests/stubs
`.trim(),
};

export function getGlobalHelp(): string {
  const lines: string[] = [
    'Usage: stubweave <command> [options]',
    '',
    'Insert pre-authored C code fragments at anchor comments.',
    '',
    'Commands:',
    '  weave <path>          Insert fragments into a file or source tree',
    '  check <path>          Report resolvable and missing anchors without writing',
    '  extract <path>        Rebuild a fragment table from stubbed sources',
    '  init [dir]            Write an example fragment table and config',
    '',
    'Run `stubweave <command> --help` for detailed usage of each command.',
    '',
    'Global Options:',
    '  --help                Show help (global or per-command)',
    '  --json                Output results as JSON (weave, check, extract)',
    '',
    'Environment:',
    '  LOG_LEVEL             Log level for stderr diagnostics (default: warn)',
    '  NO_COLOR              Disable colored output',
  ];
  return lines.join('\n');
}

export function getCommandHelp(command: string): string | undefined {
  return COMMAND_HELP[command];
}
