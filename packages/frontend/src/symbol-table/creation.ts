/**
 * Symbol table creation and modification
 */

import type { LexiconDocument } from "../lexicon/types.js";
import type { LexSymbol, SymbolKey, SymbolTable } from "./types.js";

export const symbolId = (key: SymbolKey): string => `${key.nsid}#${key.name}`;

/**
 * Create an empty symbol table
 */
export const createSymbolTable = (): SymbolTable => ({
  documents: new Map(),
  symbols: new Map(),
});

/**
 * Add a document and its defs to the table (immutable). A document with an
 * nsid already in the table replaces it, defs included.
 */
export const addDocument = (
  table: SymbolTable,
  document: LexiconDocument
): SymbolTable => {
  const documents = new Map(table.documents);
  const symbols = new Map(table.symbols);

  const replaced = documents.get(document.nsid);
  if (replaced) {
    for (const def of replaced.defs) {
      symbols.delete(symbolId({ nsid: replaced.nsid, name: def.name }));
    }
  }

  documents.set(document.nsid, document);
  for (const def of document.defs) {
    const key: SymbolKey = { nsid: document.nsid, name: def.name };
    const symbol: LexSymbol = {
      id: symbolId(key),
      key,
      definition: def.definition,
      document,
    };
    symbols.set(symbol.id, symbol);
  }

  return { documents, symbols };
};

/**
 * Build a table from bundled documents overlaid with input documents.
 */
export const buildSymbolTable = (
  inputs: readonly LexiconDocument[],
  builtins: readonly LexiconDocument[] = []
): SymbolTable =>
  [...builtins, ...inputs].reduce(addDocument, createSymbolTable());
