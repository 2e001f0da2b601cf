/**
 * Reference resolution type definitions
 */

import type { LexiconDocument, LexNamedDefinition } from "../lexicon/types.js";
import type { SymbolTable } from "../symbol-table/types.js";

/**
 * A `ref` string as it appears in a document, with the JSON path it sits at.
 */
export type ReferenceSite = {
  readonly ref: string;
  readonly path: string;
};

export type ResolveOptions = {
  /** Namespace prefix; documents outside it are not generated. */
  readonly prefix?: string;
  /** Bundled documents, shadowed by input documents with the same nsid. */
  readonly builtins?: readonly LexiconDocument[];
};

export type ResolvedDocument = {
  readonly document: LexiconDocument;
  readonly defs: readonly LexNamedDefinition[]; // Declared order
};

export type Resolution = {
  readonly table: SymbolTable;
  /** Documents with at least one generated def, sorted by nsid. */
  readonly documents: readonly ResolvedDocument[];
  /** Symbol ids of every generated def. */
  readonly generated: ReadonlySet<string>;
  /** Symbol ids referenced by generated defs but excluded by the prefix. */
  readonly opaque: ReadonlySet<string>;
  /** Symbol id to the sorted, distinct symbol ids it references. */
  readonly references: ReadonlyMap<string, readonly string[]>;
  /** Reference cycles among generated defs; members and list sorted. */
  readonly cycles: readonly (readonly string[])[];
};
