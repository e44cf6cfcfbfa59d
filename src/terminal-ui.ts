/**
 * Terminal UI Module
 * Owns the controlling terminal while the selector is open
 */

import fs from 'fs';
import tty from 'tty';
import type { Readable, Writable } from 'stream';

// ANSI escape codes
const ANSI = {
  clearScreen: '\x1b[2J\x1b[H',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
  altScreenOn: '\x1b[?1049h',
  altScreenOff: '\x1b[?1049l',
};

export const TTY_PATH = '/dev/tty';

export class TerminalUnavailableError extends Error {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot open terminal ${TTY_PATH}: ${reason}`, { cause });
    this.name = 'TerminalUnavailableError';
  }
}

export interface SelectorScreen {
  draw(frame: string): void;
  close(): void;
}

export interface Terminal<In extends Readable = tty.ReadStream> {
  input: In;
  output: Writable;
}

/**
 * Open the controlling terminal directly, so drawing works while stdout is captured
 */
export function openTerminal(): Terminal {
  let inputFd: number | null = null;
  try {
    inputFd = fs.openSync(TTY_PATH, 'r');
    const outputFd = fs.openSync(TTY_PATH, 'w');
    return {
      input: new tty.ReadStream(inputFd),
      output: new tty.WriteStream(outputFd)
    };
  } catch (err) {
    if (inputFd !== null) fs.closeSync(inputFd);
    throw new TerminalUnavailableError(err);
  }
}

export class TerminalUI implements SelectorScreen {
  private terminal: Terminal<Readable>;
  private active = false;
  private closed = false;
  private failed = false;

  constructor(terminal: Terminal<Readable>) {
    this.terminal = terminal;
    // Nothing more can be drawn once the terminal is gone
    this.terminal.output.on('error', () => {
      this.failed = true;
    });
  }

  private write(text: string): void {
    if (this.failed) return;
    this.terminal.output.write(text);
  }

  draw(frame: string): void {
    if (this.closed) return;
    if (!this.active) {
      this.write(ANSI.altScreenOn + ANSI.hideCursor);
      this.active = true;
    }
    // Raw mode may turn off output post-processing, so return the carriage explicitly
    this.write(ANSI.clearScreen + frame.replace(/\n/g, '\r\n'));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.active) {
      this.write(ANSI.clearScreen + ANSI.altScreenOff);
    }
    this.write(ANSI.showCursor);
    this.terminal.output.end();
    this.terminal.input.destroy();
  }
}
