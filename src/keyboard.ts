/**
 * Keyboard Handler Module
 * Turns raw keypresses on a TTY into selector key events
 */

import readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { KeyEvent } from './types.js';

export interface KeyData {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  shift?: boolean;
  meta?: boolean;
}

/**
 * The parts of a TTY read stream the handler uses; tty.ReadStream satisfies it
 */
export type KeyInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface KeySource {
  onKey(callback: (event: KeyEvent) => void): void;
  start(): void;
  stop(): void;
}

/**
 * Map a readline keypress to a key event, or null for keys the selector ignores
 */
export function toKeyEvent(str: string | undefined, key: KeyData | undefined): KeyEvent | null {
  const name = key?.name ?? '';

  if (key?.ctrl && name === 'c') return { type: 'interrupt' };
  if (key?.ctrl || key?.meta) return null;

  switch (name) {
    case 'up': return { type: 'up' };
    case 'down': return { type: 'down' };
    case 'return':
    case 'enter': return { type: 'confirm' };
    case 'escape': return { type: 'cancel' };
    case 'backspace': return { type: 'backspace' };
  }

  // Printable characters, space included
  if (str !== undefined && Array.from(str).length === 1 && str >= ' ' && str !== '\x7f') {
    return { type: 'char', char: str };
  }

  return null;
}

export class KeyboardHandler implements KeySource {
  private input: KeyInput;
  private callback: ((event: KeyEvent) => void) | null = null;
  private keypressListener: ((str: string | undefined, key: KeyData | undefined) => void) | null = null;
  private errorListener: ((err: Error) => void) | null = null;

  constructor(input: KeyInput) {
    this.input = input;
  }

  onKey(callback: (event: KeyEvent) => void): void {
    this.callback = callback;
  }

  start(): void {
    readline.emitKeypressEvents(this.input);
    this.setRawMode(true);

    // A hung-up terminal (EIO) ends the session like Ctrl+C; stays attached after stop()
    if (!this.errorListener) {
      this.errorListener = () => {
        if (this.callback) this.callback({ type: 'interrupt' });
      };
      this.input.on('error', this.errorListener);
    }

    this.keypressListener = (str, key) => {
      const event = toKeyEvent(str, key);
      if (event && this.callback) this.callback(event);
    };

    this.input.on('keypress', this.keypressListener);
    this.input.resume();
  }

  stop(): void {
    if (this.keypressListener) {
      this.input.removeListener('keypress', this.keypressListener);
      this.keypressListener = null;
    }
    this.setRawMode(false);
    this.input.pause();
  }

  private setRawMode(mode: boolean): void {
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(mode);
    }
  }
}

/**
 * Read one line, trimmed. End of input counts as an empty answer.
 */
export function promptLine(message: string, input: Readable = process.stdin, output: Writable = process.stdout): Promise<string> {
  const rl = readline.createInterface({ input, output, terminal: false });

  return new Promise((resolve) => {
    let answered = false;

    rl.on('close', () => {
      if (!answered) resolve('');
    });

    output.write(message);
    rl.once('line', (answer: string) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}
