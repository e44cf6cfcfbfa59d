import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import { getBookmarksFile, getConfigDir, isDebug } from '../src/config.js';

const HOME = '/home/u';

describe('Config', () => {
  describe('getConfigDir', () => {
    it('should use ~/.config on linux', () => {
      assert.strictEqual(getConfigDir({}, 'linux', HOME), '/home/u/.config');
    });

    it('should honour an absolute XDG_CONFIG_HOME', () => {
      assert.strictEqual(getConfigDir({ XDG_CONFIG_HOME: '/cfg' }, 'linux', HOME), '/cfg');
    });

    it('should ignore a relative XDG_CONFIG_HOME', () => {
      assert.strictEqual(getConfigDir({ XDG_CONFIG_HOME: 'cfg' }, 'linux', HOME), '/home/u/.config');
    });

    it('should use Application Support on macOS', () => {
      assert.strictEqual(getConfigDir({}, 'darwin', HOME), '/home/u/Library/Application Support');
    });

    it('should use APPDATA on Windows', () => {
      assert.strictEqual(getConfigDir({ APPDATA: 'C:\\Users\\u\\AppData\\Roaming' }, 'win32', HOME), 'C:\\Users\\u\\AppData\\Roaming');
    });
  });

  describe('getBookmarksFile', () => {
    it('should place bookmarks.json under the bk directory', () => {
      assert.strictEqual(getBookmarksFile({}, 'linux', HOME), '/home/u/.config/bk/bookmarks.json');
    });

    it('should prefer BK_BOOKMARKS_FILE', () => {
      assert.strictEqual(getBookmarksFile({ BK_BOOKMARKS_FILE: '/data/marks.json' }, 'linux', HOME), '/data/marks.json');
    });

    it('should resolve a relative BK_BOOKMARKS_FILE against cwd', () => {
      assert.strictEqual(getBookmarksFile({ BK_BOOKMARKS_FILE: 'marks.json' }, 'linux', HOME), path.resolve('marks.json'));
    });
  });

  describe('isDebug', () => {
    it('should only turn on for DEBUG=1', () => {
      assert.strictEqual(isDebug({ DEBUG: '1' }), true);
      assert.strictEqual(isDebug({ DEBUG: 'true' }), false);
      assert.strictEqual(isDebug({}), false);
    });
  });
});
