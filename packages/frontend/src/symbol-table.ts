/**
 * Symbol table for cross-document references
 * Main dispatcher - re-exports from symbol-table/ subdirectory
 */

export type { SymbolKey, LexSymbol, SymbolTable } from "./symbol-table/index.js";
export {
  symbolId,
  createSymbolTable,
  addDocument,
  buildSymbolTable,
  findSymbol,
  findDocument,
} from "./symbol-table/index.js";
