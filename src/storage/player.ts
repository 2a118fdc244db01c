/**
 * Player persistence: one JSON value under a fixed key
 */

import { z } from 'zod';
import { SerializationError } from '../errors';
import { MAX_GUESSES } from '../game/session';
import { createPlayer, type Player } from '../game/stats';
import type { KeyValueStore } from './index';

export const PLAYER_KEY = 'PLAYER';

const count = z.number().int().nonnegative();

const playerSchema = z.object({
  gamesPlayed: count,
  gamesWon: count,
  currentStreak: count,
  longestStreak: count,
  guessDistribution: z.array(count).length(MAX_GUESSES),
  highContrast: z.boolean(),
  hardMode: z.boolean(),
}).strict();

// Records written by earlier releases: short keys, counters as floats
const legacyPlayerSchema = z.object({
  played: count,
  won: count,
  currStreak: count,
  longestStreak: count,
  stats: z.array(count).length(MAX_GUESSES),
  hiContrast: z.boolean(),
  hardMode: z.boolean(),
}).strict().transform((legacy): Player => ({
  gamesPlayed: legacy.played,
  gamesWon: legacy.won,
  currentStreak: legacy.currStreak,
  longestStreak: legacy.longestStreak,
  guessDistribution: legacy.stats,
  highContrast: legacy.hiContrast,
  hardMode: legacy.hardMode,
}));

function invariantViolation(player: Player): string | null {
  if (player.gamesWon > player.gamesPlayed) return 'gamesWon exceeds gamesPlayed';
  if (player.currentStreak > player.longestStreak) return 'currentStreak exceeds longestStreak';
  const distributed = player.guessDistribution.reduce((sum, n) => sum + n, 0);
  if (distributed > player.gamesWon) return 'guessDistribution exceeds gamesWon';
  return null;
}

export interface PlayerRepository {
  load(): Player;
  save(player: Player): void;
}

export function parsePlayer(raw: string): Player {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new SerializationError('stored player data is not valid JSON', { cause: err });
  }
  const current = playerSchema.safeParse(json);
  const parsed = current.success ? current : legacyPlayerSchema.safeParse(json);
  if (!parsed.success) {
    // Report against the current format; the legacy one is only a fallback
    const issue = current.success ? undefined : current.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SerializationError(`stored player data is malformed${where}: ${issue?.message ?? 'unknown shape'}`);
  }

  const violation = invariantViolation(parsed.data);
  if (violation) {
    throw new SerializationError(`stored player data is malformed: ${violation}`);
  }
  return parsed.data;
}

export function serializePlayer(player: Player): string {
  const value: Player = {
    gamesPlayed: player.gamesPlayed,
    gamesWon: player.gamesWon,
    currentStreak: player.currentStreak,
    longestStreak: player.longestStreak,
    guessDistribution: [...player.guessDistribution],
    highContrast: player.highContrast,
    hardMode: player.hardMode,
  };
  return JSON.stringify(value);
}

export function createPlayerRepository(store: KeyValueStore): PlayerRepository {
  return {
    load() {
      const raw = store.get(PLAYER_KEY);
      return raw === undefined ? createPlayer() : parsePlayer(raw);
    },
    save(player) {
      store.put(PLAYER_KEY, serializePlayer(player));
    },
  };
}
