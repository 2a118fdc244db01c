/**
 * Text rendering for the board, keyboard, statistics and settings
 *
 * Everything here returns strings; callers decide where they go.
 */

import { ANSI_BOLD, paint, type CellPalette } from '../themes';
import type { LetterStates } from './feedback';
import type { BoardSnapshot } from './session';
import { winPercentage, type Player } from './stats';

// Keyboard layout
const KEYBOARD_ROWS = [
  ['Q', 'W', 'E', 'R', 'T', 'Y', 'U', 'I', 'O', 'P'],
  ['A', 'S', 'D', 'F', 'G', 'H', 'J', 'K', 'L'],
  ['Z', 'X', 'C', 'V', 'B', 'N', 'M'],
];

const BAR_WIDTH = 15;

/**
 * One line per row, five bracketed cells each: `[ A ]`, blank `[   ]`
 */
export function formatBoard(board: BoardSnapshot, palette: CellPalette): string {
  return board
    .map(row => row
      .map(cell => `[${paint(palette[cell.tone], ` ${cell.letter.toUpperCase()} `)}]`)
      .join(''))
    .join('\n');
}

export function formatKeyboard(states: LetterStates, palette: CellPalette): string {
  return KEYBOARD_ROWS
    .map((row, rowIdx) => {
      const indent = ' '.repeat(rowIdx);
      const keys = row.map(key => {
        const state = states.get(key.toLowerCase());
        return state ? paint(palette[state], key) : key;
      });
      return indent + keys.join(' ');
    })
    .join('\n');
}

export function formatStats(player: Player): string {
  const lines = [
    paint(ANSI_BOLD, '---     STATISTICS     ---'),
    `Played: ${player.gamesPlayed} | Win%: ${winPercentage(player)}% | Current streak: ${player.currentStreak} | Longest streak: ${player.longestStreak}`,
    '',
    paint(ANSI_BOLD, '--- GUESS DISTRIBUTION ---'),
  ];

  const maxDist = Math.max(...player.guessDistribution, 1);
  player.guessDistribution.forEach((count, i) => {
    const barLen = Math.round((count / maxDist) * BAR_WIDTH);
    const bar = '#'.repeat(Math.max(barLen, count > 0 ? 1 : 0));
    lines.push(`${i + 1} | ${bar}${bar ? ' ' : ''}${count}`);
  });

  return lines.join('\n');
}

export function formatSettings(player: Player): string {
  return [
    paint(ANSI_BOLD, '---   CURRENT SETTINGS   ---'),
    `High-contrast | ${player.highContrast}`,
    `Hard mode     | ${player.hardMode}`,
  ].join('\n');
}
