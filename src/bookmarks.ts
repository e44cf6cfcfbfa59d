/**
 * Bookmarks Module
 * Loads and saves the bookmark list as a single JSON document
 */

import fs from 'fs';
import path from 'path';
import type { Bookmark, BookmarkStore, BookmarksDocument, StoredBookmark } from './types.js';

export class StoreWriteError extends Error {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to save bookmarks to ${file}: ${reason}`, { cause });
    this.name = 'StoreWriteError';
    this.file = file;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBookmark(value: unknown): Bookmark | null {
  if (!isRecord(value)) return null;
  const { path: dir, name, count } = value;

  if (typeof dir !== 'string') return null;
  if (name !== undefined && name !== null && typeof name !== 'string') return null;
  if (count !== undefined && count !== null) {
    if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) return null;
  }

  return {
    path: dir,
    name: typeof name === 'string' ? name : '',
    count: typeof count === 'number' ? count : 0
  };
}

/**
 * Parse a bookmarks document. Any malformed record rejects the whole document.
 */
export function parseBookmarksDocument(content: string): Bookmark[] | null {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }

  if (!isRecord(data)) return null;
  const list = data.bookmarks;
  if (list === undefined || list === null) return [];
  if (!Array.isArray(list)) return null;

  const bookmarks: Bookmark[] = [];
  for (const item of list) {
    const bookmark = parseBookmark(item);
    if (!bookmark) return null;
    bookmarks.push(bookmark);
  }
  return bookmarks;
}

export function serializeBookmarks(bookmarks: readonly Bookmark[]): string {
  const doc: BookmarksDocument = {
    bookmarks: bookmarks.map((b): StoredBookmark => {
      // Key order here is the key order on disk
      if (b.name) return { path: b.path, name: b.name, count: b.count };
      return { path: b.path, count: b.count };
    })
  };
  return JSON.stringify(doc, null, 2);
}

/**
 * Missing, unreadable or corrupt files all mean "no bookmarks yet".
 */
export function loadBookmarks(file: string): Bookmark[] {
  if (!fs.existsSync(file)) return [];
  try {
    const content = fs.readFileSync(file, 'utf-8');
    return parseBookmarksDocument(content) ?? [];
  } catch {
    return [];
  }
}

export function saveBookmarks(file: string, bookmarks: readonly Bookmark[]): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeBookmarks(bookmarks));
  } catch (err) {
    throw new StoreWriteError(file, err);
  }
}

export function createFileStore(file: string): BookmarkStore {
  return {
    file,
    load: () => loadBookmarks(file),
    save: (bookmarks) => saveBookmarks(file, bookmarks)
  };
}
