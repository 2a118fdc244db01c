/**
 * termdle
 *
 * Five-letter word guessing game for the terminal with persistent
 * statistics.
 *
 * Library usage:
 *   import { GameSession, createWordList } from 'termdle';
 *   const words = createWordList();
 *   const session = new GameSession({ answer: words.randomAnswer(), isValidGuess: words.isValidGuess });
 *   session.submitGuess('crane');
 *
 * CLI usage:
 *   termdle play | stats | settings --highContrast=true
 */

export {
  // Feedback
  classifyGuess,
  isSolved,
  mergeLetterStates,
  FEEDBACK_RULES,
  type FeedbackRule,
  type LetterFeedback,
  type LetterStates,
} from './game/feedback';

export {
  // Session state machine
  GameSession,
  normalizeGuess,
  MAX_GUESSES,
  WORD_LENGTH,
  type BoardCell,
  type BoardSnapshot,
  type CellTone,
  type GameOutcome,
  type GuessResult,
  type RejectReason,
  type SessionOptions,
  type SessionState,
} from './game/session';

export { findHardModeViolation, type ScoredGuess } from './game/hardMode';

export {
  // Statistics
  applyOutcome,
  createPlayer,
  gamesLost,
  winPercentage,
  withSettings,
  type Player,
  type PlayerSettings,
} from './game/stats';

export { createWordList, type WordListOptions, type WordSource } from './game/words';

export { formatBoard, formatKeyboard, formatSettings, formatStats } from './game/board';

export {
  // Driver
  playGame,
  createPromptIO,
  describeOutcome,
  type GameIO,
  type PlayOptions,
  type PlayResult,
} from './game/driver';

export {
  // Storage
  openFileStore,
  createMemoryStore,
  type KeyValueStore,
} from './storage';

export {
  createPlayerRepository,
  parsePlayer,
  serializePlayer,
  PLAYER_KEY,
  type PlayerRepository,
} from './storage/player';

export {
  // Themes
  getCellPalette,
  getKeyboardPalette,
  paint,
  stripAnsi,
  ANSI_RESET,
  type CellPalette,
} from './themes';

export { runCli, USAGE, type CliDeps, type Output } from './commands';
export { resolveConfig, type Config } from './config';

export {
  TermdleError,
  UsageError,
  SessionNotTerminalError,
  InvalidOutcomeError,
  WordSourceError,
  StorageError,
  SerializationError,
  describeError,
  type ErrorCode,
  type StorageErrorKind,
} from './errors';
