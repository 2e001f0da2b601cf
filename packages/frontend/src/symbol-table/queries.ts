/**
 * Symbol table query functions
 */

import type { LexiconDocument } from "../lexicon/types.js";
import { symbolId } from "./creation.js";
import type { LexSymbol, SymbolKey, SymbolTable } from "./types.js";

export const findSymbol = (
  table: SymbolTable,
  key: SymbolKey
): LexSymbol | undefined => table.symbols.get(symbolId(key));

export const findDocument = (
  table: SymbolTable,
  nsid: string
): LexiconDocument | undefined => table.documents.get(nsid);
