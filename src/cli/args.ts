/**
 * Command-line argument parsing for the yellow binary.
 */

import type { ConfigOverrides } from '../config/types';

export const VERSION = '1.0.0';

export type ParsedArgs =
  | { command: 'run'; configPath?: string; overrides: ConfigOverrides }
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'error'; message: string };

export const USAGE = `yellow v${VERSION} - Keyboard-driven memo manager

Usage:
  yellow [options]

Options:
  --file, -f <path>   Memo file (default: .yellow.json)
  --config, -c <path> Config file (default: .yellow.yaml, ~/.config/yellow/config.yaml)
  --log <path>        Log file (default: .yellow.log)
  --no-log            Disable the log file
  --version, -v       Show version
  --help, -h          Show this help

Browsing:
  ↑/k ↓/j           Move selection
  /                 Filter memos
  Enter             Edit selected memo
  Tab               New memo
  Delete/Backspace  Delete selected memo (kept for 7 days)
  Esc               Clear filter
  q, Ctrl+C         Quit

Editing:
  Esc               Save and return to the list
  Ctrl+C            Quit without saving

Environment:
  YELLOW_FILE, YELLOW_LOG_FILE, YELLOW_LOG_LEVEL`;

/**
 * Parse argv (without the node and script entries).
 */
export function parseArgs(args: string[]): ParsedArgs {
  const overrides: ConfigOverrides = {};
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        return { command: 'help' };
      case '--version':
      case '-v':
        return { command: 'version' };
      case '--no-log':
        overrides.logFile = null;
        break;
      case '--file':
      case '-f':
      case '--config':
      case '-c':
      case '--log': {
        const value = args[++i];
        if (value === undefined || value.startsWith('-')) {
          return { command: 'error', message: `Missing value for ${arg}` };
        }
        if (arg === '--config' || arg === '-c') {
          configPath = value;
        } else if (arg === '--log') {
          overrides.logFile = value;
        } else {
          overrides.storagePath = value;
        }
        break;
      }
      default:
        return { command: 'error', message: `Unknown argument: ${arg}` };
    }
  }

  return configPath === undefined
    ? { command: 'run', overrides }
    : { command: 'run', configPath, overrides };
}
