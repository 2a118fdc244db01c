/**
 * Player profile and statistics rules
 */

import { InvalidOutcomeError } from '../errors';
import { MAX_GUESSES, type GameOutcome } from './session';

export interface Player {
  gamesPlayed: number;
  gamesWon: number;
  currentStreak: number;
  longestStreak: number;
  guessDistribution: number[]; // index 0 = won in 1, etc.
  highContrast: boolean;
  hardMode: boolean;
}

export interface PlayerSettings {
  highContrast: boolean;
  hardMode: boolean;
}

export function createPlayer(): Player {
  return {
    gamesPlayed: 0,
    gamesWon: 0,
    currentStreak: 0,
    longestStreak: 0,
    guessDistribution: new Array(MAX_GUESSES).fill(0),
    highContrast: false,
    hardMode: false,
  };
}

/**
 * Record a finished game. Returns a new Player; the input is left alone.
 */
export function applyOutcome(player: Player, outcome: GameOutcome): Player {
  if (!outcome.solved) {
    return {
      ...player,
      guessDistribution: [...player.guessDistribution],
      currentStreak: 0,
      gamesPlayed: player.gamesPlayed + 1,
    };
  }

  const { attempts } = outcome;
  if (!Number.isInteger(attempts) || attempts < 1 || attempts > MAX_GUESSES) {
    throw new InvalidOutcomeError(attempts);
  }

  const currentStreak = player.currentStreak + 1;
  const guessDistribution = [...player.guessDistribution];
  guessDistribution[attempts - 1]++;

  return {
    ...player,
    currentStreak,
    longestStreak: Math.max(player.longestStreak, currentStreak),
    guessDistribution,
    gamesWon: player.gamesWon + 1,
    gamesPlayed: player.gamesPlayed + 1,
  };
}

export function gamesLost(player: Player): number {
  return player.gamesPlayed - player.gamesWon;
}

/** Rounded to a whole percent, 0 before the first game */
export function winPercentage(player: Player): number {
  if (player.gamesPlayed === 0) return 0;
  return Math.round((player.gamesWon / player.gamesPlayed) * 100);
}

export function withSettings(player: Player, settings: Partial<PlayerSettings>): Player {
  return {
    ...player,
    guessDistribution: [...player.guessDistribution],
    highContrast: settings.highContrast ?? player.highContrast,
    hardMode: settings.hardMode ?? player.hardMode,
  };
}
