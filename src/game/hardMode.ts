/**
 * Hard mode: revealed hints must be used in every later guess
 */

import type { LetterFeedback } from './feedback';

export interface ScoredGuess {
  readonly guess: string;
  readonly feedback: readonly LetterFeedback[];
}

const ORDINALS = ['1st', '2nd', '3rd', '4th', '5th'];

/**
 * Check a candidate guess against every earlier guess
 *
 * History feedback must come from the standard rule, so a letter is never
 * required more often than the answer holds it.
 *
 * @returns a message naming the first hint the guess ignores, or null
 */
export function findHardModeViolation(guess: string, history: readonly ScoredGuess[]): string | null {
  for (const previous of history) {
    // Exact letters must stay put
    for (let i = 0; i < previous.guess.length; i++) {
      if (previous.feedback[i] === 'exact' && guess[i] !== previous.guess[i]) {
        const ordinal = ORDINALS[i] ?? `${i + 1}th`;
        return `${ordinal} letter must be ${previous.guess[i].toUpperCase()}`;
      }
    }

    // Revealed letters must be reused as many times as they were credited
    const required = new Map<string, number>();
    for (let i = 0; i < previous.guess.length; i++) {
      if (previous.feedback[i] === 'absent') continue;
      const letter = previous.guess[i];
      required.set(letter, (required.get(letter) ?? 0) + 1);
    }
    for (const [letter, count] of required) {
      const used = [...guess].filter(c => c === letter).length;
      if (used < count) {
        return `Guess must contain ${letter.toUpperCase()}`;
      }
    }
  }
  return null;
}
