/**
 * Pure feedback logic for guesses
 * Kept free of rendering so the session and the tests share it
 */

export type LetterFeedback = 'exact' | 'present' | 'absent';

/**
 * How repeated letters are credited.
 *
 * - standard: a letter is `present` only while unmatched copies remain in
 *   the answer after exact matches are taken out
 * - lenient: any letter found elsewhere in the answer is `present`,
 *   however many times it is guessed
 */
export type FeedbackRule = 'standard' | 'lenient';

export const FEEDBACK_RULES: readonly FeedbackRule[] = ['standard', 'lenient'];

/** Letter -> best state seen so far, for the keyboard line */
export type LetterStates = Map<string, LetterFeedback>;

const RANK: Record<LetterFeedback, number> = { absent: 0, present: 1, exact: 2 };

/**
 * Classify each letter of a guess against the answer
 *
 * @returns one entry per letter of the guess
 */
export function classifyGuess(
  guess: string,
  answer: string,
  rule: FeedbackRule = 'standard',
): LetterFeedback[] {
  if (guess.length !== answer.length) {
    throw new RangeError(`guess has ${guess.length} letters, answer has ${answer.length}`);
  }

  if (rule === 'lenient') {
    return [...guess].map((letter, i) => {
      if (letter === answer[i]) return 'exact';
      return answer.includes(letter) ? 'present' : 'absent';
    });
  }

  const result: LetterFeedback[] = new Array(guess.length).fill('absent');
  const remaining = new Map<string, number>();

  // First pass: exact matches, and count what is left of the answer
  for (let i = 0; i < guess.length; i++) {
    if (guess[i] === answer[i]) {
      result[i] = 'exact';
    } else {
      remaining.set(answer[i], (remaining.get(answer[i]) ?? 0) + 1);
    }
  }

  // Second pass: present but wrong position
  for (let i = 0; i < guess.length; i++) {
    if (result[i] === 'exact') continue;
    const left = remaining.get(guess[i]) ?? 0;
    if (left > 0) {
      result[i] = 'present';
      remaining.set(guess[i], left - 1);
    }
  }

  return result;
}

export function isSolved(feedback: readonly LetterFeedback[]): boolean {
  return feedback.length > 0 && feedback.every(f => f === 'exact');
}

/**
 * Fold a classified guess into the keyboard map.
 * Only upgrade state, never downgrade.
 */
export function mergeLetterStates(
  states: LetterStates,
  guess: string,
  feedback: readonly LetterFeedback[],
): LetterStates {
  const next: LetterStates = new Map(states);
  for (let i = 0; i < guess.length; i++) {
    const letter = guess[i];
    const current = next.get(letter);
    if (current === undefined || RANK[feedback[i]] > RANK[current]) {
      next.set(letter, feedback[i]);
    }
  }
  return next;
}
