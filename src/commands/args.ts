/**
 * Flag parsing for subcommands
 *
 * Flags take one or two leading dashes and a value as `--flag=value`,
 * `--flag value`, or bare `--flag` meaning true.
 */

import { UsageError } from '../errors';
import type { PlayerSettings } from '../game/stats';

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

const SETTINGS_FLAGS: Record<string, keyof PlayerSettings> = {
  highContrast: 'highContrast',
  hardMode: 'hardMode',
};

export function parseBoolean(flag: string, value: string): boolean {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new UsageError(`invalid boolean value "${value}" for -${flag}`);
}

function isBooleanLiteral(value: string | undefined): value is string {
  return value !== undefined && (TRUE_VALUES.has(value) || FALSE_VALUES.has(value));
}

/**
 * Parse `settings` arguments. Flags that are not given stay undefined.
 */
export function parseSettingsArgs(args: readonly string[]): Partial<PlayerSettings> {
  const settings: Partial<PlayerSettings> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const match = arg.match(/^--?([^=]+)(?:=(.*))?$/);
    if (!match) {
      throw new UsageError(`unexpected argument "${arg}"`);
    }

    const [, name, inline] = match;
    const key = Object.hasOwn(SETTINGS_FLAGS, name) ? SETTINGS_FLAGS[name] : undefined;
    if (!key) {
      throw new UsageError(`flag provided but not defined: -${name}`);
    }

    if (inline !== undefined) {
      settings[key] = parseBoolean(name, inline);
    } else if (isBooleanLiteral(args[i + 1])) {
      settings[key] = parseBoolean(name, args[i + 1]);
      i++;
    } else {
      settings[key] = true;
    }
  }

  return settings;
}

/**
 * Subcommands without flags reject anything after them
 */
export function expectNoArgs(command: string, args: readonly string[]): void {
  if (args.length > 0) {
    throw new UsageError(`${command} takes no arguments, got "${args.join(' ')}"`);
  }
}
