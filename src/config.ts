/**
 * Runtime configuration from the environment
 */

import { homedir } from 'os';
import { resolve } from 'path';
import { FEEDBACK_RULES, type FeedbackRule } from './game/feedback';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_HOME_DIR = '.termdle';
export const DATA_FILE = 'termdle.json';

export interface Config {
  /** Directory holding the player store */
  homeDir: string;
  /** Full path of the key-value file */
  dataFile: string;
  feedbackRule: FeedbackRule;
}

function isFeedbackRule(value: string): value is FeedbackRule {
  return FEEDBACK_RULES.some(rule => rule === value);
}

/**
 * TERMDLE_HOME overrides ~/.termdle; TERMDLE_FEEDBACK picks the
 * duplicate-letter rule and falls back to standard when unrecognised.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const home = env.TERMDLE_HOME?.trim();
  const homeDir = home ? resolve(home) : resolve(homedir(), DEFAULT_HOME_DIR);
  const feedback = env.TERMDLE_FEEDBACK?.trim().toLowerCase() ?? '';

  return {
    homeDir,
    dataFile: resolve(homeDir, DATA_FILE),
    feedbackRule: isFeedbackRule(feedback) ? feedback : 'standard',
  };
}
