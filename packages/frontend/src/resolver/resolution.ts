/**
 * Lexicon resolution
 *
 * Builds the symbol table, picks the defs to generate and checks that every
 * ref they contain resolves. Cycles are recorded, not rejected.
 */

import type { Diagnostic } from "../types/diagnostic.js";
import { ok, type Result } from "../types/result.js";
import type { LexiconSet } from "../lexicon/types.js";
import { matchesNamespacePrefix } from "../lexicon/nsid.js";
import { buildSymbolTable } from "../symbol-table/creation.js";
import type { LexSymbol } from "../symbol-table/types.js";
import {
  findStronglyConnectedComponents,
  isCyclicComponent,
} from "../graph/components.js";
import { collectReferences, resolveReference } from "./references.js";
import type {
  ResolveOptions,
  ResolvedDocument,
  Resolution,
} from "./types.js";

const compareCodeUnits = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Resolve a loaded lexicon set.
 *
 * Generated defs are every def of the documents the prefix selects, plus the
 * bundled defs they reach. A ref into an input document the prefix excludes
 * is recorded as opaque and not followed.
 */
export const resolveLexicons = (
  lexicons: LexiconSet,
  options: ResolveOptions = {}
): Result<Resolution, Diagnostic> => {
  const table = buildSymbolTable(lexicons.documents, options.builtins ?? []);

  const selected = new Set(
    [...table.documents.values()]
      .filter(
        (doc) =>
          doc.origin === "input" && matchesNamespacePrefix(doc.nsid, options.prefix)
      )
      .map((doc) => doc.nsid)
  );

  const isGeneratedTarget = (symbol: LexSymbol): boolean =>
    symbol.document.origin === "builtin" || selected.has(symbol.document.nsid);

  const generated = new Set<string>();
  const opaque = new Set<string>();
  const references = new Map<string, readonly string[]>();
  const queue: LexSymbol[] = [];

  const enqueue = (symbol: LexSymbol): void => {
    if (generated.has(symbol.id)) return;
    generated.add(symbol.id);
    queue.push(symbol);
  };

  for (const nsid of [...selected].sort(compareCodeUnits)) {
    const document = table.documents.get(nsid);
    for (const def of document?.defs ?? []) {
      const symbol = table.symbols.get(`${nsid}#${def.name}`);
      if (symbol) enqueue(symbol);
    }
  }

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    const symbol = next;
    const targets = new Set<string>();

    for (const site of collectReferences(symbol.definition, `defs.${symbol.key.name}`)) {
      const target = resolveReference(table, symbol.key, site);
      if (!target.ok) return target;

      targets.add(target.value.id);
      if (isGeneratedTarget(target.value)) {
        enqueue(target.value);
      } else {
        opaque.add(target.value.id);
      }
    }

    references.set(symbol.id, [...targets].sort(compareCodeUnits));
  }

  const nodes = [...generated].sort(compareCodeUnits);
  const cycles = findStronglyConnectedComponents(nodes, references)
    .filter((component) => isCyclicComponent(component, references))
    .sort((a, b) => compareCodeUnits(a[0] ?? "", b[0] ?? ""));

  const documents: ResolvedDocument[] = [...table.documents.values()]
    .map((document) => ({
      document,
      defs: document.defs.filter((def) =>
        generated.has(`${document.nsid}#${def.name}`)
      ),
    }))
    .filter((resolved) => resolved.defs.length > 0)
    .sort((a, b) => compareCodeUnits(a.document.nsid, b.document.nsid));

  return ok({
    table,
    documents,
    generated,
    opaque,
    references,
    cycles,
  });
};
