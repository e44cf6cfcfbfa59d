/**
 * View Module
 * Renders selector state as a block of text with ANSI styling
 */

import type { SelectorState } from './types.js';

// ANSI escape codes
export const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  inverse: '\x1b[7m',
  red: '\x1b[31m',
  gray: '\x1b[38;5;245m',
  orange: '\x1b[38;5;214m',
};

export const EMPTY_MESSAGE = "No bookmarks yet. Use 'bk add' to add the current directory.";
export const HELP_LINE = '↑/↓ navigate • enter select • e rename • d delete • esc clear • q quit';

function dim(text: string): string {
  return `${ANSI.gray}${text}${ANSI.reset}`;
}

function highlight(text: string): string {
  return `${ANSI.inverse}${text}${ANSI.reset}`;
}

function renderRows(state: SelectorState): string[] {
  if (state.filtered.length === 0) {
    return [dim('  No matches')];
  }

  return state.filtered.map((idx, row) => {
    const b = state.bookmarks[idx];
    const label = b.name || b.path;
    const selected = row === state.cursor;

    let line = selected ? `  > ${highlight(label)}` : `    ${label}`;
    if (b.name) {
      line += dim(` ${b.path}`);
    }
    return line;
  });
}

/**
 * Pure: the same state always renders the same frame.
 */
export function renderSelector(state: SelectorState): string {
  const lines: string[] = [''];

  if (state.bookmarks.length === 0) {
    lines.push(`  ${EMPTY_MESSAGE}`, '', '  Press q to quit.');
    if (state.status) {
      lines.push('', `  ${ANSI.red}${state.status}${ANSI.reset}`);
    }
    return lines.join('\n') + '\n';
  }

  if (state.filter !== '') {
    lines.push(`  ${ANSI.bold}${ANSI.orange}filter:${ANSI.reset} ${state.filter}`, '');
  }

  if (state.editing) {
    lines.push(`  Rename bookmark: ${state.editBuffer}`);
    lines.push('  (Enter to save, Esc to cancel)', '');
  }

  lines.push(...renderRows(state));

  if (state.status) {
    lines.push('', `  ${ANSI.red}${state.status}${ANSI.reset}`);
  }

  lines.push('', `  ${HELP_LINE}`);
  return lines.join('\n') + '\n';
}
