/**
 * doctags CLI entry point.
 *
 * Usage:
 *   doctags build     Scan the docs and write the generated tags page
 *   doctags tags      List tags and their page counts
 */

import { runBuild } from './commands/build';
import { runTags } from './commands/tags';
import { getGlobalHelp, getCommandHelp } from './help';
import type { Logger } from '../shared/logger';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'json', 'verbose'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        // --key value, unless the key is a known boolean flag
        const key = arg.slice(2);
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          options[key] = args[++i];
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

export interface RunDeps {
  logger?: Logger;
  /** Working directory for relative tags_folder/tags_template. */
  baseDir?: string;
}

export function run(
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
  deps: RunDeps = {},
): number {
  const { command, flags, options } = parseArgs(argv);

  if (flags.help || flags.h) {
    if (command) {
      const cmdHelp = getCommandHelp(command);
      if (cmdHelp) {
        write(cmdHelp);
        return 0;
      }
    }
    write(getGlobalHelp());
    return 0;
  }

  switch (command) {
    case 'build':
      return runBuild(
        {
          docsDir: options['docs-dir'] ?? 'docs',
          siteDir: options['site-dir'] ?? 'site',
          configPath: options.config,
          baseDir: deps.baseDir,
          verbose: !!flags.verbose,
          json: !!flags.json,
          logger: deps.logger,
        },
        write,
      );

    case 'tags':
      return runTags({ docsDir: options['docs-dir'] ?? 'docs', json: !!flags.json }, write);

    case 'help':
    case '':
      write(getGlobalHelp());
      return 0;

    default:
      write(`Unknown command: ${command}. Run \`doctags help\` for usage.`);
      return 2;
  }
}
