import { beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../errors';
import type { GameIO } from '../game/driver';
import { createPlayer } from '../game/stats';
import type { WordSource } from '../game/words';
import { createMemoryStore, type KeyValueStore } from '../storage';
import { PLAYER_KEY, parsePlayer } from '../storage/player';
import { stripAnsi } from '../themes';
import { USAGE, runCli, type CliDeps } from './index';

const words: WordSource = {
  randomAnswer: () => 'crane',
  isValidGuess: word => ['crane', 'train', 'crate'].includes(word),
};

function silentIO(inputs: string[]): GameIO {
  const queue = [...inputs];
  return {
    intro: () => {},
    ask: async () => queue.shift() ?? null,
    show: () => {},
    warn: () => {},
    outro: () => {},
    abandon: () => {},
  };
}

describe('runCli', () => {
  let store: ReturnType<typeof createMemoryStore>;
  let stdout: string;
  let stderr: string;
  let closes: number;

  function deps(overrides: Partial<CliDeps> = {}): CliDeps {
    const tracked: KeyValueStore = {
      get: key => store.get(key),
      put: (key, value) => store.put(key, value),
      close: () => { closes++; },
    };
    return {
      openStore: () => tracked,
      words,
      io: silentIO([]),
      stdout: { write: text => { stdout += text; } },
      stderr: { write: text => { stderr += text; } },
      ...overrides,
    };
  }

  function storedPlayer() {
    const raw = store.get(PLAYER_KEY);
    if (raw === undefined) throw new Error('no player stored');
    return parsePlayer(raw);
  }

  beforeEach(() => {
    store = createMemoryStore();
    stdout = '';
    stderr = '';
    closes = 0;
  });

  describe('usage', () => {
    it('requires a subcommand', async () => {
      expect(await runCli([], deps())).toBe(1);
      expect(stderr).toBe(`error: play, settings, or stats subcommand required\n${USAGE}`);
    });

    it('rejects an unknown subcommand', async () => {
      expect(await runCli(['scores'], deps())).toBe(1);
      expect(stderr.split('\n')[0]).toBe('error: unknown command "scores": play, settings, or stats subcommand required');
      expect(closes).toBe(0);
    });

    it.each(['help', '--help', '-h'])('prints help for %s', async arg => {
      expect(await runCli([arg], deps())).toBe(0);
      expect(stdout).toBe(USAGE);
    });

    it('rejects arguments to play', async () => {
      expect(await runCli(['play', '--fast'], deps())).toBe(1);
      expect(stderr.split('\n')[0]).toBe('error: play takes no arguments, got "--fast"');
    });
  });

  describe('stats', () => {
    it('prints zeroed statistics for a new player', async () => {
      expect(await runCli(['stats'], deps())).toBe(0);
      const lines = stripAnsi(stdout).split('\n');
      expect(lines[1]).toBe('Played: 0 | Win%: 0% | Current streak: 0 | Longest streak: 0');
      expect(lines.slice(4, 10)).toEqual(['1 | 0', '2 | 0', '3 | 0', '4 | 0', '5 | 0', '6 | 0']);
      expect(closes).toBe(1);
    });

    it('does not write to the store', async () => {
      await runCli(['stats'], deps());
      expect(store.entries()).toEqual({});
    });

    it('fails with one diagnostic line on corrupt data', async () => {
      store.put(PLAYER_KEY, '{"gamesPlayed":"lots"}');
      expect(await runCli(['stats'], deps())).toBe(1);
      expect(stderr.startsWith('error: stored player data is malformed')).toBe(true);
      expect(stderr.trimEnd().split('\n')).toHaveLength(1);
      expect(closes).toBe(1);
    });
  });

  describe('settings', () => {
    it('overwrites, prints and persists the flags', async () => {
      expect(await runCli(['settings', '--highContrast=true'], deps())).toBe(0);
      expect(stripAnsi(stdout).split('\n')).toEqual([
        '---   CURRENT SETTINGS   ---',
        'High-contrast | true',
        'Hard mode     | false',
        '',
      ]);
      expect(storedPlayer()).toEqual({ ...createPlayer(), highContrast: true });
    });

    it('keeps settings that are not given', async () => {
      await runCli(['settings', '--highContrast=true'], deps());
      await runCli(['settings', '--hardMode'], deps());
      expect(storedPlayer()).toMatchObject({ highContrast: true, hardMode: true });
    });

    it('rejects a bad boolean without saving', async () => {
      expect(await runCli(['settings', '--highContrast=maybe'], deps())).toBe(1);
      expect(stderr.split('\n')[0]).toBe('error: invalid boolean value "maybe" for -highContrast');
      expect(store.entries()).toEqual({});
      expect(closes).toBe(1);
    });
  });

  describe('play', () => {
    it('plays a game and records the win', async () => {
      const code = await runCli(['play'], deps({ io: silentIO(['train', 'crate', 'crane']) }));
      expect(code).toBe(0);
      expect(storedPlayer()).toMatchObject({
        gamesPlayed: 1,
        gamesWon: 1,
        guessDistribution: [0, 0, 1, 0, 0, 0],
      });
    });

    it('uses stored settings for the session', async () => {
      await runCli(['settings', '--hardMode=true'], deps());
      const code = await runCli(['play'], deps({ io: silentIO(['train', 'crate', 'crane']) }));
      expect(code).toBe(0);
      // "crate" drops the revealed N and is refused, so "crane" is the second guess
      expect(storedPlayer().guessDistribution).toEqual([0, 1, 0, 0, 0, 0]);
    });

    it('exits non-zero when no answer can be drawn', async () => {
      const broken: WordSource = {
        randomAnswer: () => { throw new Error('boom'); },
        isValidGuess: () => false,
      };
      expect(await runCli(['play'], deps({ words: broken }))).toBe(1);
      expect(stderr).toBe('error: could not pick an answer: boom\n');
      expect(store.entries()).toEqual({});
    });
  });

  describe('storage failures', () => {
    it('reports a store that cannot be opened', async () => {
      const code = await runCli(['stats'], deps({
        openStore: () => { throw new StorageError('open', 'could not open store /tmp/termdle.json'); },
      }));
      expect(code).toBe(1);
      expect(stderr).toBe('error: could not open store /tmp/termdle.json\n');
    });

    it('reports a failed save', async () => {
      const readOnly: KeyValueStore = {
        get: () => undefined,
        put: () => { throw new StorageError('write', 'could not write "PLAYER" to /tmp/termdle.json'); },
        close: () => {},
      };
      const code = await runCli(['settings', '--hardMode'], deps({ openStore: () => readOnly }));
      expect(code).toBe(1);
      expect(stderr).toBe('error: could not write "PLAYER" to /tmp/termdle.json\n');
    });
  });
});
