/**
 * Selector Session
 * Event loop tying keys, state transitions, persistence and drawing together
 */

import { createSelectorState, setStatus, transition } from './selector.js';
import { renderSelector } from './view.js';
import type { KeySource } from './keyboard.js';
import type { SelectorScreen } from './terminal-ui.js';
import type { BookmarkStore, KeyEvent, SelectorState, SessionOutcome } from './types.js';

export interface DispatchResult {
  state: SelectorState;
  /** null when the event did not touch the store */
  saved: boolean | null;
}

export class SelectorSession {
  private store: BookmarkStore;
  private keys: KeySource;
  private screen: SelectorScreen;
  private state: SelectorState;
  private saveErrors: string[] = [];
  private finish: ((outcome: SessionOutcome) => void) | null = null;

  constructor(store: BookmarkStore, keys: KeySource, screen: SelectorScreen) {
    this.store = store;
    this.keys = keys;
    this.screen = screen;
    this.state = createSelectorState([]);
  }

  getState(): SelectorState {
    return this.state;
  }

  run(): Promise<SessionOutcome> {
    this.state = createSelectorState(this.store.load());

    return new Promise((resolve) => {
      this.finish = resolve;
      this.keys.onKey((event) => this.dispatch(event));
      this.screen.draw(renderSelector(this.state));
      this.keys.start();
    });
  }

  /**
   * Apply one event synchronously: transition, save if needed, redraw or finish
   */
  dispatch(event: KeyEvent): DispatchResult {
    if (this.state.done) return { state: this.state, saved: null };

    const next = transition(this.state, event);
    let state = next.state;
    let saved: boolean | null = null;

    if (next.persist) {
      saved = this.persist(state);
      if (!saved) {
        state = setStatus(state, this.saveErrors[this.saveErrors.length - 1] ?? null);
      }
    }

    this.state = state;

    if (state.done) {
      this.end();
    } else {
      this.screen.draw(renderSelector(state));
    }

    return { state, saved };
  }

  private persist(state: SelectorState): boolean {
    try {
      this.store.save(state.bookmarks);
      return true;
    } catch (err) {
      this.saveErrors.push(err instanceof Error ? err.message : String(err));
      return false;
    }
  }

  private end(): void {
    this.keys.stop();
    this.screen.close();

    const finish = this.finish;
    this.finish = null;
    if (finish) {
      finish({ path: this.state.result, saveErrors: [...this.saveErrors] });
    }
  }
}
