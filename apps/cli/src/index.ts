import { readFileSync } from 'node:fs';
import { binary, run, subcommands } from 'cmd-ts';

import { allCommand } from './commands/all/index.js';
import { cleanCommand } from './commands/clean/index.js';
import { convertCommand } from './commands/convert/index.js';
import { emojisCommand } from './commands/emojis/index.js';
import { renameFilesCommand } from './commands/rename-files/index.js';

const packageJson: { version: string } = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
);

const commands = {
  convert: convertCommand,
  clean: cleanCommand,
  emojis: emojisCommand,
  rename_files: renameFilesCommand,
  all: allCommand,
};

export const app = subcommands({
  name: 'refmt',
  description: 'Code transformation toolkit: case conversion, whitespace, emojis and file names',
  version: packageJson.version,
  cmds: commands,
});

const TOP_LEVEL_FLAGS = new Set(['--help', '-h', '--version']);

/**
 * `refmt <path>` is shorthand for `refmt all <path>`: insert the default
 * subcommand when the first argument is not a known one.
 */
export function preprocessArgv(argv: string[]): string[] {
  const [runtime, script, first, ...rest] = argv;
  if (runtime === undefined || script === undefined || first === undefined) {
    return argv;
  }
  if (Object.hasOwn(commands, first) || TOP_LEVEL_FLAGS.has(first)) {
    return argv;
  }
  return [runtime, script, 'all', first, ...rest];
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await run(binary(app), preprocessArgv(argv));
}
