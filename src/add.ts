/**
 * Add Command
 * Appends the working directory to the bookmark list
 */

import fs from 'fs';
import path from 'path';
import type { Env } from './config.js';
import type { Bookmark, BookmarkStore } from './types.js';

export type AddResult =
  | { kind: 'exists'; path: string }
  | { kind: 'added'; bookmark: Bookmark };

/**
 * Prefer the shell's logical $PWD (keeps symlinked paths as typed) when it
 * names the same directory as the real cwd.
 */
export function resolveWorkingDirectory(env: Env = process.env, cwd: string = process.cwd()): string {
  const pwd = env.PWD;
  if (!pwd || !path.isAbsolute(pwd)) return cwd;

  try {
    const a = fs.statSync(pwd);
    const b = fs.statSync(cwd);
    return a.dev === b.dev && a.ino === b.ino ? pwd : cwd;
  } catch {
    return cwd;
  }
}

/**
 * Paths are compared as literal strings. Save errors propagate to the caller.
 */
export async function addBookmark(
  store: BookmarkStore,
  dir: string,
  askAlias: () => Promise<string>
): Promise<AddResult> {
  const bookmarks = store.load();

  if (bookmarks.some(b => b.path === dir)) {
    return { kind: 'exists', path: dir };
  }

  const alias = (await askAlias()).trim();
  const bookmark: Bookmark = { path: dir, name: alias, count: 0 };

  store.save([...bookmarks, bookmark]);
  return { kind: 'added', bookmark };
}
