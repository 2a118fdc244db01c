/**
 * Terminal color themes
 *
 * Maps a board cell tone to ANSI escape codes. Two highlight pairs:
 * the standard green/yellow and a high-contrast orange/blue.
 */

import type { CellTone } from '../game/session';

/**
 * Opening escape for a styled cell; empty string means unstyled
 */
export type CellPalette = Record<CellTone, string>;

export type PaletteMode = 'standard' | 'highContrast';

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';

export const ANSI_BOLD = '\x1b[1m';

const palettes: Record<PaletteMode, CellPalette> = {
  standard: {
    exact: '\x1b[1;42;97m',   // Green bg, white text
    present: '\x1b[1;43;30m', // Yellow bg, black text
    absent: '',
    empty: '',
  },
  highContrast: {
    exact: '\x1b[1;48;5;202;97m', // Orange bg, white text
    present: '\x1b[1;46;30m',     // Cyan-blue bg, black text
    absent: '',
    empty: '',
  },
};

/**
 * Keyboard letters ruled out get dimmed; the board shows them plain
 */
const KEYBOARD_ABSENT = '\x1b[2;100;97m';

export function getCellPalette(highContrast: boolean): CellPalette {
  return palettes[highContrast ? 'highContrast' : 'standard'];
}

export function getKeyboardPalette(highContrast: boolean): CellPalette {
  return { ...getCellPalette(highContrast), absent: KEYBOARD_ABSENT };
}

/**
 * Wrap text in a style, or leave it untouched when the style is empty
 */
export function paint(style: string, text: string): string {
  return style ? `${style}${text}${ANSI_RESET}` : text;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
