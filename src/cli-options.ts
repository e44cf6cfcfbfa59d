/**
 * CLI Options Parser
 * Picks the command to run from the arguments
 */

import type { CliOptionsData, Command } from './types.js';

export class CliOptions implements CliOptionsData {
  command: Command | null = null;
  errors: string[] = [];

  constructor(argv: string[] = process.argv.slice(2)) {
    this._parse(argv);
  }

  private _parse(argv: string[]): void {
    if (argv.length === 0) {
      this.command = 'select';
      return;
    }

    const [first, ...rest] = argv;

    if (first === 'help' || first === '--help' || first === '-h') {
      this.command = 'help';
      return;
    }

    if (first === 'add') {
      if (rest.length > 0) {
        this.errors.push(`Unexpected argument: ${rest[0]}`);
        return;
      }
      this.command = 'add';
      return;
    }

    this.errors.push(`Unknown command: ${first}`);
  }

  isValid(): boolean {
    return this.errors.length === 0;
  }

  getErrorMessage(): string | null {
    if (this.errors.length === 0) {
      return null;
    }

    return '\n❌ ' + this.errors.join('\n❌ ') + '\n';
  }

  getUsageMessage(): string {
    return `Usage: bk [add | help]

Run 'bk help' for full usage information.
`;
  }
}

export const HELP_TEXT = `bk - directory bookmarks

Usage:
  bk        Open bookmark selector
  bk add    Add current directory to bookmarks

Keys:
  ↑/↓, j/k  Navigate
  Enter     Go to selected directory
  e         Edit bookmark name
  d         Delete bookmark
  Esc       Clear filter
  q         Quit

Type to filter by name or path.

Environment:
  BK_BOOKMARKS_FILE  Use this bookmarks file instead of the default
  DEBUG=1            Print stack traces on errors

Shell integration (add to ~/.bashrc or ~/.zshrc so selecting changes directory):
  bk() {
    if [[ "$1" == "add" ]]; then
      command bk add
    else
      local dir
      dir=$(command bk "$@")
      if [[ -n "$dir" && -d "$dir" ]]; then
        cd "$dir"
      fi
    fi
  }`;
