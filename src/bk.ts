#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { CliOptions, HELP_TEXT } from './cli-options.js';
import { createFileStore } from './bookmarks.js';
import { getBookmarksFile, isDebug } from './config.js';
import { addBookmark, resolveWorkingDirectory } from './add.js';
import { KeyboardHandler, promptLine } from './keyboard.js';
import { TerminalUI, openTerminal } from './terminal-ui.js';
import { SelectorSession } from './selector-session.js';

async function handleAdd(): Promise<void> {
  const store = createFileStore(getBookmarksFile());
  const dir = resolveWorkingDirectory();

  const result = await addBookmark(store, dir, () => {
    console.log(`Adding: ${dir}`);
    return promptLine('Alias (enter to skip): ');
  });

  if (result.kind === 'exists') {
    console.log(`Bookmark already exists: ${result.path}`);
    return;
  }

  const { name, path } = result.bookmark;
  console.log(name ? `Added bookmark: ${name} (${path})` : `Added bookmark: ${path}`);
}

async function handleSelect(): Promise<void> {
  const store = createFileStore(getBookmarksFile());
  const terminal = openTerminal();
  const session = new SelectorSession(
    store,
    new KeyboardHandler(terminal.input),
    new TerminalUI(terminal)
  );

  const outcome = await session.run();

  for (const message of outcome.saveErrors) {
    console.error(`❌ ${message}`);
  }

  // The shell wrapper reads this line and changes directory
  if (outcome.path !== null) {
    process.stdout.write(`${outcome.path}\n`);
  }
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const options = new CliOptions(argv);

  if (!options.isValid()) {
    console.error(options.getErrorMessage());
    console.error(options.getUsageMessage());
    process.exit(1);
  }

  switch (options.command) {
    case 'help':
      console.log(HELP_TEXT);
      return;
    case 'add':
      await handleAdd();
      return;
    case 'select':
      await handleSelect();
      return;
  }
}

// Main execution check
const modulePath = fileURLToPath(import.meta.url);
const scriptPath = process.argv[1];

if (scriptPath && (modulePath.endsWith(scriptPath) || scriptPath.endsWith('bk') || scriptPath.endsWith('bk.js'))) {
  main().catch(err => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n❌ Error: ${message}\n`);
    if (isDebug() && err instanceof Error) {
      console.error(err.stack);
    }
    process.exit(1);
  });
}

export { main, handleAdd, handleSelect };
