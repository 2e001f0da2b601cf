/**
 * Symbol table type definitions
 */

import type {
  LexDefinition,
  LexiconDocument,
} from "../lexicon/types.js";

/**
 * Canonical address of a definition: `(nsid, def name)`.
 */
export type SymbolKey = {
  readonly nsid: string;
  readonly name: string;
};

export type LexSymbol = {
  readonly id: string; // "nsid#name"
  readonly key: SymbolKey;
  readonly definition: LexDefinition;
  readonly document: LexiconDocument;
};

export type SymbolTable = {
  readonly documents: ReadonlyMap<string, LexiconDocument>; // nsid to document
  readonly symbols: ReadonlyMap<string, LexSymbol>; // symbol id to symbol
};
