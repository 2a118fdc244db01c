/**
 * CLI entry point for termdle
 *
 * Wires the real collaborators (file store under TERMDLE_HOME, bundled
 * word list, @clack/prompts) into the dispatcher and exits with its code.
 */

import { runCli } from './commands';
import { resolveConfig } from './config';
import { createPromptIO } from './game/driver';
import { createWordList } from './game/words';
import { openFileStore } from './storage';

async function main(): Promise<number> {
  const config = resolveConfig();
  return runCli(process.argv.slice(2), {
    openStore: () => openFileStore(config.dataFile),
    words: createWordList(),
    io: createPromptIO(),
    stdout: { write: text => process.stdout.write(text) },
    stderr: { write: text => process.stderr.write(text) },
    feedbackRule: config.feedbackRule,
  });
}

main().then(
  code => process.exit(code),
  err => {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
