/**
 * Reference resolver - Public API
 */

export type {
  ReferenceSite,
  ResolveOptions,
  ResolvedDocument,
  Resolution,
} from "./types.js";
export {
  parseReference,
  resolveReference,
  collectReferences,
} from "./references.js";
export { resolveLexicons } from "./resolution.js";
