/**
 * Interactive `play` loop
 *
 * Prompts for guesses until the session ends, then records the outcome and
 * persists the player. The prompt itself sits behind GameIO so the loop can
 * run against scripted input.
 */

import * as p from '@clack/prompts';
import { WordSourceError } from '../errors';
import type { PlayerRepository } from '../storage/player';
import { getCellPalette, getKeyboardPalette } from '../themes';
import { formatBoard, formatKeyboard } from './board';
import type { FeedbackRule } from './feedback';
import { GameSession, MAX_GUESSES, type GameOutcome } from './session';
import { applyOutcome, type Player } from './stats';
import type { WordSource } from './words';

export interface GameIO {
  intro(title: string): void;
  /** Resolves to null when the player cancels (Ctrl-C / Esc) */
  ask(attempt: number, maxGuesses: number): Promise<string | null>;
  show(text: string): void;
  warn(text: string): void;
  outro(text: string): void;
  abandon(text: string): void;
}

export type PlayResult =
  | { status: 'finished'; outcome: GameOutcome; player: Player }
  | { status: 'abandoned' };

export interface PlayOptions {
  player: Player;
  repository: PlayerRepository;
  words: WordSource;
  io: GameIO;
  feedbackRule?: FeedbackRule;
}

function drawAnswer(words: WordSource): string {
  try {
    return words.randomAnswer();
  } catch (err) {
    if (err instanceof WordSourceError) throw err;
    throw new WordSourceError('could not pick an answer', { cause: err });
  }
}

export function describeOutcome(outcome: GameOutcome): string {
  if (outcome.solved) {
    const noun = outcome.attempts === 1 ? 'guess' : 'guesses';
    return `Impressive! You got the word in ${outcome.attempts} ${noun}`;
  }
  return `The answer was ${outcome.answer.toUpperCase()}`;
}

export async function playGame(options: PlayOptions): Promise<PlayResult> {
  const { player, repository, words, io } = options;
  const answer = drawAnswer(words);
  const session = new GameSession({
    answer,
    isValidGuess: word => words.isValidGuess(word),
    hardMode: player.hardMode,
    feedbackRule: options.feedbackRule,
  });
  const palette = getCellPalette(player.highContrast);
  const keyboardPalette = getKeyboardPalette(player.highContrast);

  io.intro(player.hardMode ? 'termdle (hard mode)' : 'termdle');

  while (!session.isTerminal) {
    const input = await io.ask(session.attempt, MAX_GUESSES);
    if (input === null) {
      io.abandon('Game abandoned, statistics unchanged');
      return { status: 'abandoned' };
    }

    const result = session.submitGuess(input);
    if (!result.ok) {
      io.warn(result.message);
      continue;
    }

    io.show(`${formatBoard(session.renderBoard(), palette)}\n\n${formatKeyboard(session.letterStates(), keyboardPalette)}`);
  }

  const outcome = session.finish();
  const updated = applyOutcome(player, outcome);
  repository.save(updated);
  io.outro(describeOutcome(outcome));

  return { status: 'finished', outcome, player: updated };
}

/**
 * GameIO on top of @clack/prompts
 */
export function createPromptIO(): GameIO {
  return {
    intro: title => p.intro(title),
    async ask(attempt, maxGuesses) {
      const value = await p.text({
        message: `Guess ${attempt}/${maxGuesses}`,
        placeholder: 'five letters',
      });
      // An empty submit resolves to undefined
      return p.isCancel(value) ? null : value ?? '';
    },
    show: text => p.log.message(text),
    warn: text => p.log.warn(text),
    outro: text => p.outro(text),
    abandon: text => p.cancel(text),
  };
}
