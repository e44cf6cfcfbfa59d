import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { SelectorSession } from '../src/selector-session.js';
import { renderSelector } from '../src/view.js';
import type { KeySource } from '../src/keyboard.js';
import type { SelectorScreen } from '../src/terminal-ui.js';
import type { Bookmark, BookmarkStore, KeyEvent } from '../src/types.js';

class FakeKeys implements KeySource {
  callback: ((event: KeyEvent) => void) | null = null;
  started = false;
  stopped = false;

  onKey(callback: (event: KeyEvent) => void): void { this.callback = callback; }
  start(): void { this.started = true; }
  stop(): void { this.stopped = true; }

  press(...events: KeyEvent[]): void {
    for (const event of events) {
      if (this.callback) this.callback(event);
    }
  }
}

class FakeScreen implements SelectorScreen {
  frames: string[] = [];
  closed = 0;

  draw(frame: string): void { this.frames.push(frame); }
  close(): void { this.closed++; }
}

class MemoryStore implements BookmarkStore {
  readonly file = '/dev/null/bookmarks.json';
  saved: Bookmark[][] = [];
  failWith: string | null = null;

  constructor(private initial: Bookmark[]) {}

  load(): Bookmark[] {
    return this.initial.map(b => ({ ...b }));
  }

  save(bookmarks: readonly Bookmark[]): void {
    if (this.failWith) throw new Error(this.failWith);
    this.saved.push(bookmarks.map(b => ({ ...b })));
  }
}

describe('SelectorSession', () => {
  let keys: FakeKeys;
  let screen: FakeScreen;
  let store: MemoryStore;

  beforeEach(() => {
    keys = new FakeKeys();
    screen = new FakeScreen();
    store = new MemoryStore([
      { path: '/a', name: '', count: 1 },
      { path: '/b', name: 'bee', count: 5 }
    ]);
  });

  it('should draw the sorted list and start reading keys', () => {
    const session = new SelectorSession(store, keys, screen);
    void session.run();

    assert.strictEqual(keys.started, true);
    assert.strictEqual(screen.frames.length, 1);
    assert.strictEqual(screen.frames[0], renderSelector(session.getState()));
    assert.deepStrictEqual(session.getState().bookmarks.map(b => b.path), ['/b', '/a']);
  });

  it('should resolve with the selected path and persist the new count', async () => {
    const session = new SelectorSession(store, keys, screen);
    const outcome = session.run();

    keys.press({ type: 'confirm' });

    assert.deepStrictEqual(await outcome, { path: '/b', saveErrors: [] });
    assert.deepStrictEqual(store.saved, [[
      { path: '/b', name: 'bee', count: 6 },
      { path: '/a', name: '', count: 1 }
    ]]);
    assert.strictEqual(keys.stopped, true);
    assert.strictEqual(screen.closed, 1);
  });

  it('should resolve with no path on quit without saving', async () => {
    const session = new SelectorSession(store, keys, screen);
    const outcome = session.run();

    keys.press({ type: 'char', char: 'q' });

    assert.deepStrictEqual(await outcome, { path: null, saveErrors: [] });
    assert.deepStrictEqual(store.saved, []);
  });

  it('should redraw after each event', () => {
    const session = new SelectorSession(store, keys, screen);
    void session.run();

    keys.press({ type: 'down' }, { type: 'char', char: 'x' });

    assert.strictEqual(screen.frames.length, 3);
    assert.strictEqual(screen.frames[2], renderSelector(session.getState()));
  });

  it('should save on rename and delete', () => {
    const session = new SelectorSession(store, keys, screen);
    void session.run();

    const renamed = session.dispatch({ type: 'char', char: 'e' });
    assert.strictEqual(renamed.saved, null);

    session.dispatch({ type: 'backspace' });
    const committed = session.dispatch({ type: 'confirm' });
    assert.strictEqual(committed.saved, true);

    const deleted = session.dispatch({ type: 'char', char: 'd' });
    assert.strictEqual(deleted.saved, true);

    assert.deepStrictEqual(store.saved, [
      [{ path: '/b', name: 'be', count: 5 }, { path: '/a', name: '', count: 1 }],
      [{ path: '/a', name: '', count: 1 }]
    ]);
  });

  it('should keep state and show a status line when a save fails', () => {
    store.failWith = 'disk full';
    const session = new SelectorSession(store, keys, screen);
    void session.run();

    const result = session.dispatch({ type: 'char', char: 'd' });

    assert.strictEqual(result.saved, false);
    assert.strictEqual(result.state.status, 'disk full');
    assert.deepStrictEqual(result.state.bookmarks.map(b => b.path), ['/a']);
    assert.ok(screen.frames[screen.frames.length - 1].includes('disk full'));
  });

  it('should report save failures from the final selection', async () => {
    store.failWith = 'read-only file system';
    const session = new SelectorSession(store, keys, screen);
    const outcome = session.run();

    keys.press({ type: 'down' }, { type: 'confirm' });

    assert.deepStrictEqual(await outcome, { path: '/a', saveErrors: ['read-only file system'] });
  });

  it('should ignore events after finishing', async () => {
    const session = new SelectorSession(store, keys, screen);
    const outcome = session.run();

    keys.press({ type: 'cancel' }, { type: 'confirm' });

    assert.deepStrictEqual(await outcome, { path: null, saveErrors: [] });
    assert.strictEqual(screen.closed, 1);
    assert.deepStrictEqual(store.saved, []);
  });
});
