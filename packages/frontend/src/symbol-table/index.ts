/**
 * Symbol table - Public API
 */

export type { SymbolKey, LexSymbol, SymbolTable } from "./types.js";
export {
  symbolId,
  createSymbolTable,
  addDocument,
  buildSymbolTable,
} from "./creation.js";
export { findSymbol, findDocument } from "./queries.js";
