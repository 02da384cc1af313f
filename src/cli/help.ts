/**
 * CLI help text for global and per-command --help output.
 *
 * Each subcommand help follows a consistent structure:
 *   SYNOPSIS, DESCRIPTION, FLAGS, EXAMPLES
 */

const COMMAND_HELP: Record<string, string> = {
  build: `
SYNOPSIS
  doctags build [--docs-dir=DIR] [--site-dir=DIR] [--config=FILE] [--verbose] [--json]

DESCRIPTION
  Scan every markdown page under the docs directory, group the pages by
  the tags in their front matter and write the generated tags page to
  the configured tags folder. Every page is handed the full tag index
  as "all_tags", as a site build would do.

FLAGS
  --docs-dir=DIR    Directory holding the markdown sources (default: docs)
  --site-dir=DIR    Site output root the tags page is registered under (default: site)
  --config=FILE     Options file (default: doctags.yml)
  --verbose         Log every scanned file and the full tag list
  --json            Output the build summary as JSON

EXAMPLES
  doctags build
  doctags build --docs-dir=content --config=site/doctags.yml
  doctags build --verbose --json
`.trim(),

  tags: `
SYNOPSIS
  doctags tags [--docs-dir=DIR] [--json]

DESCRIPTION
  List every tag found in the docs directory with the number of pages
  carrying it, in the order the tags page uses. Nothing is written.

FLAGS
  --docs-dir=DIR    Directory holding the markdown sources (default: docs)
  --json            Output the tag list as JSON

EXAMPLES
  doctags tags
  doctags tags --docs-dir=content --json
`.trim(),
};

export function getCommandHelp(command: string): string | null {
  return COMMAND_HELP[command] ?? null;
}

export function getGlobalHelp(): string {
  return `
doctags - group documentation pages by front-matter tags

USAGE
  doctags <command> [flags]

COMMANDS
  build     Scan the docs and write the generated tags page
  tags      List tags and their page counts
  help      Show this help

Run \`doctags <command> --help\` for command details.
`.trim();
}
