/**
 * Selector Module
 * Pure state machine behind the interactive bookmark picker
 */

import type { Bookmark, KeyEvent, SelectorState, Transition } from './types.js';

/**
 * Most used first. Array.prototype.sort is stable, so ties keep their order.
 */
export function sortByUsage(bookmarks: readonly Bookmark[]): Bookmark[] {
  return [...bookmarks].sort((a, b) => b.count - a.count);
}

export function filterBookmarks(bookmarks: readonly Bookmark[], filter: string): number[] {
  if (filter === '') {
    return bookmarks.map((_, i) => i);
  }

  const needle = filter.toLowerCase();
  const indices: number[] = [];
  bookmarks.forEach((b, i) => {
    if (b.name.toLowerCase().includes(needle) || b.path.toLowerCase().includes(needle)) {
      indices.push(i);
    }
  });
  return indices;
}

export function createSelectorState(bookmarks: readonly Bookmark[]): SelectorState {
  const sorted = sortByUsage(bookmarks);
  return {
    bookmarks: sorted,
    filtered: filterBookmarks(sorted, ''),
    cursor: 0,
    filter: '',
    editing: false,
    editBuffer: '',
    result: null,
    done: false,
    status: null
  };
}

/**
 * Index into state.bookmarks of the row under the cursor
 */
export function selectedIndex(state: SelectorState): number | undefined {
  return state.filtered[state.cursor];
}

export function selectedBookmark(state: SelectorState): Bookmark | undefined {
  const idx = selectedIndex(state);
  return idx === undefined ? undefined : state.bookmarks[idx];
}

function dropLastChar(text: string): string {
  const chars = Array.from(text);
  chars.pop();
  return chars.join('');
}

function replaceAt(bookmarks: readonly Bookmark[], idx: number, patch: Partial<Bookmark>): Bookmark[] {
  return bookmarks.map((b, i) => (i === idx ? { ...b, ...patch } : b));
}

function stay(state: SelectorState): Transition {
  return { state, persist: false };
}

function withFilter(state: SelectorState, filter: string): SelectorState {
  return {
    ...state,
    filter,
    filtered: filterBookmarks(state.bookmarks, filter),
    cursor: 0
  };
}

function moveCursor(state: SelectorState, delta: -1 | 1): SelectorState {
  const next = state.cursor + delta;
  if (next < 0 || next >= state.filtered.length) return state;
  return { ...state, cursor: next };
}

function quit(state: SelectorState): Transition {
  return stay({ ...state, editing: false, editBuffer: '', result: null, done: true });
}

function select(state: SelectorState): Transition {
  const idx = selectedIndex(state);
  if (idx === undefined) return stay(state);

  const bookmark = state.bookmarks[idx];
  return {
    state: {
      ...state,
      bookmarks: replaceAt(state.bookmarks, idx, { count: bookmark.count + 1 }),
      result: bookmark.path,
      done: true
    },
    persist: true
  };
}

function startEditing(state: SelectorState): Transition {
  const bookmark = selectedBookmark(state);
  if (!bookmark) return stay(state);
  return stay({ ...state, editing: true, editBuffer: bookmark.name, status: null });
}

function remove(state: SelectorState): Transition {
  const idx = selectedIndex(state);
  if (idx === undefined) return stay(state);

  // Indices shift after removal, so filtered is rebuilt rather than patched
  const bookmarks = state.bookmarks.filter((_, i) => i !== idx);
  const filtered = filterBookmarks(bookmarks, state.filter);
  let cursor = state.cursor;
  if (cursor >= filtered.length && cursor > 0) {
    cursor--;
  }

  return {
    state: { ...state, bookmarks, filtered, cursor, status: null },
    persist: true
  };
}

function handleEditing(state: SelectorState, event: KeyEvent): Transition {
  switch (event.type) {
    case 'confirm': {
      const idx = selectedIndex(state);
      const done = { ...state, editing: false, editBuffer: '' };
      if (idx === undefined) return stay(done);
      return {
        state: { ...done, bookmarks: replaceAt(state.bookmarks, idx, { name: state.editBuffer }) },
        persist: true
      };
    }
    case 'cancel':
      return stay({ ...state, editing: false, editBuffer: '' });
    case 'backspace':
      return stay({ ...state, editBuffer: dropLastChar(state.editBuffer) });
    case 'char':
      return stay({ ...state, editBuffer: state.editBuffer + event.char });
    case 'interrupt':
      return quit(state);
    default:
      return stay(state);
  }
}

// Single-key commands, only active while no filter is typed
function handleCommandKey(state: SelectorState, char: string): Transition | null {
  switch (char) {
    case 'q':
      return quit(state);
    case 'e':
      return startEditing(state);
    case 'd':
      return remove(state);
    case 'j':
      return stay(moveCursor(state, 1));
    case 'k':
      return stay(moveCursor(state, -1));
    default:
      return null;
  }
}

function handleBrowsing(state: SelectorState, event: KeyEvent): Transition {
  switch (event.type) {
    case 'interrupt':
      return quit(state);
    case 'cancel':
      if (state.filter !== '') return stay(withFilter(state, ''));
      return quit(state);
    case 'up':
      return stay(moveCursor(state, -1));
    case 'down':
      return stay(moveCursor(state, 1));
    case 'confirm':
      return select(state);
    case 'backspace':
      if (state.filter === '') return stay(state);
      return stay(withFilter(state, dropLastChar(state.filter)));
    case 'char': {
      if (state.filter === '') {
        const command = handleCommandKey(state, event.char);
        if (command) return command;
      }
      return stay(withFilter(state, state.filter + event.char));
    }
  }
}

/**
 * Apply one key event. A finished state ignores further events.
 */
export function transition(state: SelectorState, event: KeyEvent): Transition {
  if (state.done) return stay(state);
  if (state.editing) return handleEditing(state, event);
  return handleBrowsing(state, event);
}

export function setStatus(state: SelectorState, status: string | null): SelectorState {
  return { ...state, status };
}
