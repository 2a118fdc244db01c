/**
 * Word source: picks answers and decides which guesses count as words
 */

import { WordSourceError } from '../errors';
import wordData from './words.json';

export interface WordSource {
  randomAnswer(): string;
  isValidGuess(word: string): boolean;
}

export interface WordListOptions {
  /** Candidate answers; every answer is also an accepted guess */
  answers?: readonly string[];
  /** Extra words accepted as guesses but never chosen */
  allowed?: readonly string[];
  random?: () => number;
}

const WORD_PATTERN = /^[a-z]{5}$/;

export function createWordList(options: WordListOptions = {}): WordSource {
  const answers = (options.answers ?? wordData.answers).map(w => w.toLowerCase());
  const allowed = (options.allowed ?? wordData.allowed).map(w => w.toLowerCase());
  const random = options.random ?? Math.random;
  const dictionary = new Set([...answers, ...allowed]);

  return {
    randomAnswer() {
      if (answers.length === 0) {
        throw new WordSourceError('no answers available in the word list');
      }
      const index = Math.floor(random() * answers.length);
      const answer = answers[Math.min(Math.max(index, 0), answers.length - 1)];
      if (!WORD_PATTERN.test(answer)) {
        throw new WordSourceError(`word list entry "${answer}" is not a five-letter word`);
      }
      return answer;
    },
    isValidGuess(word: string) {
      return WORD_PATTERN.test(word) && dictionary.has(word);
    },
  };
}
