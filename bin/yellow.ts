#!/usr/bin/env node
/**
 * yellow - Keyboard-driven memo manager
 *
 * Interactive terminal UI for keeping short notes in a local JSON file.
 * Deleted memos are kept for a retention window, then purged on load.
 *
 * Usage:
 *   yellow [--file <path>] [--config <path>] [--log <path> | --no-log]
 *
 * Examples:
 *   yellow
 *   yellow --file ~/notes/memos.json
 */

import { MemoController } from '../src/app/controller';
import { USAGE, VERSION, parseArgs } from '../src/cli/args';
import { loadConfig } from '../src/config/loader';
import { type ConfigOverrides, ConfigError, type YellowConfig } from '../src/config/types';
import { createLogger, describeError, openLogFile } from '../src/logging/logger';
import { MemoStore } from '../src/memos/store';
import { DAY_MS } from '../src/memos/types';
import { BlessedView } from '../src/ui/blessed-view';
import { EditorBuffer } from '../src/ui/editor';
import type { MemoListItem } from '../src/ui/items';
import { FilterableList } from '../src/ui/list';

// ============================================================================
// Startup Helpers
// ============================================================================

function readConfig(configPath: string | undefined, overrides: ConfigOverrides): YellowConfig | null {
  try {
    const loaded = loadConfig({ configPath, overrides });
    for (const warning of loaded.warnings) {
      console.error(`[Config] Warning: ${warning.path}: ${warning.message}`);
    }
    return loaded.config;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return null;
    }
    throw error;
  }
}

function startView(list: FilterableList<MemoListItem>, editor: EditorBuffer): BlessedView | null {
  try {
    return new BlessedView({ list, editor });
  } catch (error) {
    console.error(`Error: could not start terminal UI: ${describeError(error)}`);
    return null;
  }
}

// ============================================================================
// Main
// ============================================================================

/**
 * Resolves with the exit code once the UI has shut down.
 */
async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  switch (parsed.command) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'version':
      console.log(`yellow v${VERSION}`);
      return 0;
    case 'error':
      console.error(`Error: ${parsed.message}`);
      console.error('Run yellow --help for usage.');
      return 1;
    case 'run':
      break;
  }

  const config = readConfig(parsed.configPath, parsed.overrides);
  if (!config) return 1;

  const logFile = config.logFile ? openLogFile(config.logFile) : null;
  const logOptions = { level: config.logLevel, file: logFile };
  const log = createLogger('session', logOptions);

  const store = new MemoStore(
    { storagePath: config.storagePath, retentionMs: config.retentionDays * DAY_MS },
    createLogger('store', logOptions)
  );
  const list = new FilterableList<MemoListItem>();
  const editor = new EditorBuffer();

  const view = startView(list, editor);
  if (!view) {
    log.error('Failed to start terminal UI');
    return 1;
  }

  let finish: (code: number) => void = () => {};
  const exited = new Promise<number>((resolve) => {
    finish = resolve;
  });

  const controller: MemoController = new MemoController({
    store,
    list,
    editor,
    log,
    onQuit: (code) => {
      log.info('Quit', { code });
      finish(code);
    },
    onUpdate: () => view.render(controller),
    onFatal: (error) => {
      log.error('Event loop terminated', { error: describeError(error) });
      finish(1);
    },
  });

  log.info('Starting', { storagePath: config.storagePath });
  view.attach(controller);
  controller.start();
  view.render(controller);

  const code = await exited;
  view.destroy();

  // Let saves already dispatched reach the disk before exiting
  try {
    await Promise.all([controller.settled(), store.settled()]);
  } catch (error) {
    log.error('Pending save failed during shutdown', { error: describeError(error) });
  }

  return code;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
