/**
 * Command dispatcher: play, settings, stats
 *
 * Returns the process exit code instead of exiting, so every path is
 * testable. Fatal errors are printed as one `error:` line.
 */

import { TermdleError, UsageError, describeError } from '../errors';
import { formatSettings, formatStats } from '../game/board';
import { playGame, type GameIO } from '../game/driver';
import type { FeedbackRule } from '../game/feedback';
import { withSettings } from '../game/stats';
import type { WordSource } from '../game/words';
import type { KeyValueStore } from '../storage';
import { createPlayerRepository, type PlayerRepository } from '../storage/player';
import { expectNoArgs, parseSettingsArgs } from './args';

export interface Output {
  write: (text: string) => void;
}

export interface CliDeps {
  openStore: () => KeyValueStore;
  words: WordSource;
  io: GameIO;
  stdout: Output;
  stderr: Output;
  feedbackRule?: FeedbackRule;
}

export const USAGE = `
  termdle: guess the five-letter word in six tries

  Usage:
    termdle play                          Start a game
    termdle stats                         Show your statistics
    termdle settings [flags]              Change and show settings
    termdle help                          Show this help

  Settings flags:
    --highContrast=<bool>   Orange/blue highlights instead of green/yellow
    --hardMode=<bool>       Revealed hints must be used in later guesses

  Environment:
    TERMDLE_HOME            Where statistics are kept (default ~/.termdle)
    TERMDLE_FEEDBACK        standard (default) or lenient duplicate-letter rule
`;

const HELP_ARGS = new Set(['help', '--help', '-h']);

function runStats(repository: PlayerRepository, args: readonly string[], deps: CliDeps): void {
  expectNoArgs('stats', args);
  deps.stdout.write(`${formatStats(repository.load())}\n`);
}

function runSettings(repository: PlayerRepository, args: readonly string[], deps: CliDeps): void {
  const settings = parseSettingsArgs(args);
  const player = withSettings(repository.load(), settings);
  deps.stdout.write(`${formatSettings(player)}\n`);
  repository.save(player);
}

async function runPlay(repository: PlayerRepository, args: readonly string[], deps: CliDeps): Promise<void> {
  expectNoArgs('play', args);
  await playGame({
    player: repository.load(),
    repository,
    words: deps.words,
    io: deps.io,
    feedbackRule: deps.feedbackRule,
  });
}

async function dispatch(command: string, args: readonly string[], deps: CliDeps): Promise<void> {
  if (command !== 'play' && command !== 'stats' && command !== 'settings') {
    throw new UsageError(`unknown command "${command}": play, settings, or stats subcommand required`);
  }

  const store = deps.openStore();
  try {
    const repository = createPlayerRepository(store);
    switch (command) {
      case 'play': await runPlay(repository, args, deps); break;
      case 'stats': runStats(repository, args, deps); break;
      case 'settings': runSettings(repository, args, deps); break;
    }
  } finally {
    store.close();
  }
}

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const [command, ...args] = argv;

  if (command === undefined) {
    deps.stderr.write(`error: play, settings, or stats subcommand required\n${USAGE}`);
    return 1;
  }

  if (HELP_ARGS.has(command)) {
    deps.stdout.write(USAGE);
    return 0;
  }

  try {
    await dispatch(command, args, deps);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      deps.stderr.write(`error: ${err.message}\n${USAGE}`);
      return 1;
    }
    const prefix = err instanceof TermdleError ? '' : 'unexpected ';
    deps.stderr.write(`${prefix}error: ${describeError(err)}\n`);
    return 1;
  }
}
