/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
lexmodel - pydantic model generator for atproto lexicons v${VERSION}

USAGE:
  lexmodel <command> [lexicon-dir] [options]

COMMANDS:
  generate [lexicon-dir]    Generate models.py from a lexicon directory
  hash [lexicon-dir]        Print the cache key of a lexicon directory

  The lexicon directory defaults to ./lexicons when it exists, else ".".

BUNDLED LEXICONS:
  Refs may point into these com.atproto documents without copying them in:
  admin.defs, label.defs, label.subscribeLabels, moderation.defs,
  repo.applyWrites, repo.defs, repo.listRecords, repo.strongRef,
  server.createAppPassword, server.defs, sync.listRepos, sync.subscribeRepos.
  Any other com.atproto document must be placed in the lexicon directory.

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: lexmodel.json)

GENERATE/HASH OPTIONS:
  -p, --prefix <nsid>       Only generate documents under this namespace
  -o, --out <dir>           Output directory (default: ./generated)
  --no-cache                Regenerate even when the cache has this input
  --cache-dir <dir>         Cache root directory

EXAMPLES:
  lexmodel generate
  lexmodel generate ./lexicons -p app.example -o src/models
  lexmodel hash ./lexicons -p app.example
`);
};
