/**
 * Game session state machine
 *
 * One session per `play`: up to six accepted guesses against a fixed
 * answer, ending either solved or exhausted. Input handling and rendering
 * live elsewhere; this module only decides what a guess does to the state.
 */

import { SessionNotTerminalError } from '../errors';
import {
  classifyGuess,
  isSolved,
  mergeLetterStates,
  type FeedbackRule,
  type LetterFeedback,
  type LetterStates,
} from './feedback';
import { findHardModeViolation, type ScoredGuess } from './hardMode';

export const MAX_GUESSES = 6;
export const WORD_LENGTH = 5;

// ============================================================================
// TYPES
// ============================================================================

export type SessionState =
  | { readonly kind: 'awaiting'; readonly attempt: number }
  | { readonly kind: 'solved'; readonly attempts: number }
  | { readonly kind: 'exhausted' };

export type RejectReason = 'invalid-guess' | 'hard-mode' | 'session-over';

export type GuessResult =
  | { ok: true; guess: string; feedback: LetterFeedback[]; state: SessionState }
  | { ok: false; reason: RejectReason; guess: string; message: string };

export interface GameOutcome {
  solved: boolean;
  attempts: number;
  answer: string;
}

export type CellTone = LetterFeedback | 'empty';

export interface BoardCell {
  letter: string;
  tone: CellTone;
}

/** MAX_GUESSES rows of WORD_LENGTH cells */
export type BoardSnapshot = BoardCell[][];

export interface SessionOptions {
  answer: string;
  isValidGuess: (word: string) => boolean;
  hardMode?: boolean;
  feedbackRule?: FeedbackRule;
}

/**
 * Lowercase and strip the line terminator and stray whitespace
 */
export function normalizeGuess(raw: string): string {
  return raw.trim().toLowerCase();
}

// ============================================================================
// SESSION
// ============================================================================

export class GameSession {
  readonly answer: string;
  readonly hardMode: boolean;
  readonly feedbackRule: FeedbackRule;

  private readonly isValidGuess: (word: string) => boolean;
  private readonly scored: ScoredGuess[] = [];
  private current: SessionState = { kind: 'awaiting', attempt: 1 };

  constructor(options: SessionOptions) {
    const answer = normalizeGuess(options.answer);
    if (answer.length !== WORD_LENGTH) {
      throw new RangeError(`answer must have ${WORD_LENGTH} letters, got "${options.answer}"`);
    }
    this.answer = answer;
    this.isValidGuess = options.isValidGuess;
    this.hardMode = options.hardMode ?? false;
    this.feedbackRule = options.feedbackRule ?? 'standard';
  }

  get state(): SessionState {
    return { ...this.current };
  }

  get guesses(): string[] {
    return this.scored.map(s => s.guess);
  }

  get history(): readonly ScoredGuess[] {
    return this.scored.map(({ guess, feedback }) => ({ guess, feedback: [...feedback] }));
  }

  get solved(): boolean {
    return this.current.kind === 'solved';
  }

  get isTerminal(): boolean {
    return this.current.kind !== 'awaiting';
  }

  /** Attempt number being played, or the last one used once terminal */
  get attempt(): number {
    return this.current.kind === 'awaiting' ? this.current.attempt : this.scored.length;
  }

  submitGuess(raw: string): GuessResult {
    const guess = normalizeGuess(raw);

    if (this.current.kind !== 'awaiting') {
      return { ok: false, reason: 'session-over', guess, message: 'The game is already over' };
    }

    if (guess.length !== WORD_LENGTH || !this.isValidGuess(guess)) {
      return { ok: false, reason: 'invalid-guess', guess, message: `${guess || '(empty)'} is an invalid guess, try again` };
    }

    if (this.hardMode) {
      const violation = findHardModeViolation(guess, this.hints());
      if (violation) {
        return { ok: false, reason: 'hard-mode', guess, message: violation };
      }
    }

    const feedback = classifyGuess(guess, this.answer, this.feedbackRule);
    this.scored.push({ guess, feedback });

    if (isSolved(feedback)) {
      this.current = { kind: 'solved', attempts: this.scored.length };
    } else if (this.scored.length >= MAX_GUESSES) {
      this.current = { kind: 'exhausted' };
    } else {
      this.current = { kind: 'awaiting', attempt: this.scored.length + 1 };
    }

    return { ok: true, guess, feedback: [...feedback], state: { ...this.current } };
  }

  /** Earlier guesses scored by the standard rule, whatever the display rule */
  private hints(): ScoredGuess[] {
    if (this.feedbackRule === 'standard') return this.scored;
    return this.scored.map(({ guess }) => ({ guess, feedback: classifyGuess(guess, this.answer, 'standard') }));
  }

  renderBoard(): BoardSnapshot {
    const board: BoardSnapshot = [];
    for (let row = 0; row < MAX_GUESSES; row++) {
      const entry = this.scored[row];
      const cells: BoardCell[] = [];
      for (let col = 0; col < WORD_LENGTH; col++) {
        cells.push(entry
          ? { letter: entry.guess[col], tone: entry.feedback[col] }
          : { letter: ' ', tone: 'empty' });
      }
      board.push(cells);
    }
    return board;
  }

  letterStates(): LetterStates {
    let states: LetterStates = new Map();
    for (const { guess, feedback } of this.scored) {
      states = mergeLetterStates(states, guess, feedback);
    }
    return states;
  }

  finish(): GameOutcome {
    if (this.current.kind === 'awaiting') {
      throw new SessionNotTerminalError(this.current.attempt);
    }
    return {
      solved: this.current.kind === 'solved',
      attempts: this.scored.length,
      answer: this.answer,
    };
  }
}
