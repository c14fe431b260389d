/**
 * taskreview - interactive review of backend items
 */

import terminalKit from 'terminal-kit';
import { BackendAdapter } from '../backend/adapter.js';
import { TaskwarriorBackend, type TaskBackend } from '../backend/taskwarrior.js';
import { loadConfig, resolveKeysPath, resolveReviewTag, type Config } from '../config/loader.js';
import { generateMappings } from '../keys/defaults.js';
import { KeybindingRegistry } from '../keys/registry.js';
import { HOUR_MS } from './date-utils.js';
import { parseSortMode } from '../query/sort.js';
import type { SortMode } from '../schema/index.js';
import { runShell } from '../tui/shell.js';
import { KitTerminal, type ReviewTerminal } from '../tui/terminal.js';
import type { ReviewContext } from '../tui/review-session.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, extractFlags } from './flag-utils.js';

export interface ReviewOptions {
  config: Config;
  keysPath: string;
  reviewTag: string;
  filter: string;
  sortMode: SortMode;
  showAll: boolean;
}

export function printReviewHelp(): void {
  console.log(`Usage: taskreview [options]

Page through backend items one at a time and edit them with single keys.

On start:
  - loads keybindings from the keys file
  - assigns keys to the projects, assignees and tags of open items

On exit:
  - saves keybindings back to the keys file

Options:
  --filter, -f <expr>    Initial filter (e.g. "project:home +@sam")
  --config, -c <path>    Path to config file
  --keys, -k <path>      Keybinding file (default ~/.taskreview)
  --rtag, -r <tag>       Tag marking completed items as reviewed (default r:$USER)
  --sort, -s <mode>      urgency | date | color
  --all                  Show already reviewed items
  -h, --help             Show help
  -v, --version          Show version
`);
}

export function parseReviewFlags(args: string[]): ReviewOptions {
  const valueFlags = extractFlags(args, ['--filter', '-f', '--config', '-c', '--keys', '-k', '--rtag', '-r', '--sort', '-s']);
  const booleanFlags = extractBooleanFlags(args, ['--all']);

  const unknown = args.find((a) => a.startsWith('--'));
  if (unknown) {
    throw new CliUsageError(`Unknown option '${unknown}'.`);
  }

  const configPath = valueFlags['--config'] ?? valueFlags['-c'];
  const config = loadConfig(configPath);

  const sortFlag = valueFlags['--sort'] ?? valueFlags['-s'];
  const sortMode = sortFlag === undefined ? config.sort : parseSortMode(sortFlag);
  if (!sortMode) {
    throw new CliUsageError(`Invalid sort mode '${sortFlag ?? ''}'. Expected urgency, date or color.`);
  }

  // Positional words join the filter, so `taskreview project:home` works too.
  const filterFlag = valueFlags['--filter'] ?? valueFlags['-f'] ?? '';
  const filter = [filterFlag, ...args].join(' ').trim();

  return {
    config,
    keysPath: resolveKeysPath(config, valueFlags['--keys'] ?? valueFlags['-k']),
    reviewTag: resolveReviewTag(config, valueFlags['--rtag'] ?? valueFlags['-r']),
    filter,
    sortMode,
    showAll: booleanFlags.has('--all'),
  };
}

export async function handleReviewCommand(args: string[]): Promise<void> {
  const options = parseReviewFlags(args);
  const backend = new TaskwarriorBackend(options.config.backend);
  const term = terminalKit.terminal;
  const terminal = new KitTerminal(term, Boolean(options.config.colors?.disable));

  console.log(`Loading keybindings from ${options.keysPath}`);
  terminal.open();
  try {
    await runReviewConsole(options, backend, terminal);
  } finally {
    terminal.close();
  }
  console.log(`Saved keybindings to ${options.keysPath}`);
}

/**
 * Load keys, learn this run's vocabulary, run the shell, persist keys.
 * Split from the command so it runs against any backend and terminal.
 */
export async function runReviewConsole(
  options: ReviewOptions,
  backend: TaskBackend,
  terminal: ReviewTerminal,
  clock: () => Date = () => new Date()
): Promise<string> {
  const { config } = options;
  const keys = KeybindingRegistry.load(options.keysPath);
  const adapter = new BackendAdapter(backend, clock);
  generateMappings(keys, adapter.vocabulary());

  const ctx: ReviewContext = {
    adapter,
    keys,
    terminal,
    settings: { sortMode: options.sortMode, showAll: options.showAll },
    policy: { reviewTag: options.reviewTag, windowMs: config.reviewWindowHours * HOUR_MS },
    listLimit: config.listLimit,
    defaultColor: config.defaultColor,
    clock,
  };

  const filter = await runShell(ctx, options.filter);
  keys.save(options.keysPath);
  return filter;
}
