/**
 * Shared type definitions for bk
 */

// ============================================================================
// Store Types
// ============================================================================

/**
 * A saved directory
 */
export interface Bookmark {
  /** Absolute directory path, unique within the store */
  path: string;
  /** Alias shown instead of the path; empty when unset */
  name: string;
  /** Number of times the bookmark was selected */
  count: number;
}

/**
 * On-disk shape of the bookmarks file
 */
export interface BookmarksDocument {
  bookmarks: StoredBookmark[];
}

export interface StoredBookmark {
  path: string;
  name?: string;
  count: number;
}

export interface BookmarkStore {
  readonly file: string;
  load(): Bookmark[];
  save(bookmarks: readonly Bookmark[]): void;
}

// ============================================================================
// Selector Types
// ============================================================================

export type KeyEvent =
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'confirm' }
  | { type: 'cancel' }
  | { type: 'backspace' }
  | { type: 'interrupt' }
  | { type: 'char'; char: string };

/**
 * Interactive selector state. Treated as immutable: transitions build a new value.
 */
export interface SelectorState {
  readonly bookmarks: readonly Bookmark[];
  /** Indices into bookmarks that match the filter, in bookmarks order */
  readonly filtered: readonly number[];
  /** Index into filtered */
  readonly cursor: number;
  readonly filter: string;
  readonly editing: boolean;
  readonly editBuffer: string;
  /** Path to report once the session is done */
  readonly result: string | null;
  readonly done: boolean;
  /** One-line message shown under the list, e.g. a failed save */
  readonly status: string | null;
}

export interface Transition {
  state: SelectorState;
  /** Whether state.bookmarks must be written to the store */
  persist: boolean;
}

export interface SessionOutcome {
  path: string | null;
  saveErrors: string[];
}

// ============================================================================
// CLI Types
// ============================================================================

export type Command = 'select' | 'add' | 'help';

export interface CliOptionsData {
  command: Command | null;
  errors: string[];
}
