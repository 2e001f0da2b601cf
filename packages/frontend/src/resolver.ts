/**
 * Reference resolution across lexicon documents
 * Main dispatcher - re-exports from resolver/ subdirectory
 */

export type {
  ReferenceSite,
  ResolveOptions,
  ResolvedDocument,
  Resolution,
} from "./resolver/index.js";
export {
  parseReference,
  resolveReference,
  collectReferences,
  resolveLexicons,
} from "./resolver/index.js";
