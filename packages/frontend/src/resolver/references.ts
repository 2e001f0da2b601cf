/**
 * Reference parsing, lookup and collection
 */

import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { ok, error, type Result } from "../types/result.js";
import type {
  LexBody,
  LexDefinition,
  LexItem,
  LexObject,
} from "../lexicon/types.js";
import { findDocument, findSymbol } from "../symbol-table/queries.js";
import type { LexSymbol, SymbolKey, SymbolTable } from "../symbol-table/types.js";
import type { ReferenceSite } from "./types.js";

/**
 * Turn a ref string into a symbol key.
 *
 * - `#name` names a def in the referring document
 * - `nsid#name` names a def in another document
 * - `nsid` names that document's `main` def
 */
export const parseReference = (
  ref: string,
  fromNsid: string
): SymbolKey | undefined => {
  const parts = ref.split("#");
  if (parts.length > 2) return undefined;

  const [nsid = "", name] = parts;
  if (name === undefined) {
    return nsid.length > 0 ? { nsid, name: "main" } : undefined;
  }
  if (name.length === 0) return undefined;
  return { nsid: nsid.length > 0 ? nsid : fromNsid, name };
};

/**
 * Kinds a ref may point at. XRPC endpoints are not types.
 */
const isReferenceable = (definition: LexDefinition): boolean => {
  switch (definition.kind) {
    case "query":
    case "procedure":
    case "subscription":
    case "ref":
      return false;
    default:
      return true;
  }
};

/**
 * Resolve a ref found in `from` at `site`.
 */
export const resolveReference = (
  table: SymbolTable,
  from: SymbolKey,
  site: ReferenceSite
): Result<LexSymbol, Diagnostic> => {
  const location = { nsid: from.nsid, def: from.name, path: site.path };
  const key = parseReference(site.ref, from.nsid);
  if (!key) {
    return error(
      createDiagnostic("LEX2001", `Malformed reference '${site.ref}'`, location, {
        ref: site.ref,
        hint: "Use '#name', 'nsid' or 'nsid#name'",
      })
    );
  }

  const symbol = findSymbol(table, key);
  if (!symbol) {
    const message = findDocument(table, key.nsid)
      ? `Reference '${site.ref}' does not resolve: '${key.nsid}' has no definition '${key.name}'`
      : `Reference '${site.ref}' does not resolve: lexicon '${key.nsid}' is not loaded`;
    return error(
      createDiagnostic("LEX2001", message, location, { ref: site.ref })
    );
  }

  if (!isReferenceable(symbol.definition)) {
    return error(
      createDiagnostic(
        "LEX2002",
        `Reference '${site.ref}' points at a '${symbol.definition.kind}' definition, which is not a type`,
        location,
        { ref: site.ref }
      )
    );
  }

  return ok(symbol);
};

const join = (path: string, key: string): string =>
  path.length > 0 ? `${path}.${key}` : key;

const collectFromItem = (
  item: LexItem,
  path: string,
  sites: ReferenceSite[]
): void => {
  switch (item.kind) {
    case "ref":
      sites.push({ ref: item.ref, path });
      return;
    case "union":
      item.refs.forEach((ref, i) => {
        sites.push({ ref, path: join(path, `refs.${i}`) });
      });
      return;
    case "array":
      collectFromItem(item.items, join(path, "items"), sites);
      return;
    case "boolean":
    case "integer":
    case "string":
    case "bytes":
    case "cid-link":
    case "blob":
    case "unknown":
      return;
  }
};

const collectFromObject = (
  object: LexObject,
  path: string,
  sites: ReferenceSite[]
): void => {
  for (const property of object.properties) {
    collectFromItem(property.type, join(path, `properties.${property.name}`), sites);
  }
};

const collectFromBody = (
  body: LexBody | undefined,
  path: string,
  sites: ReferenceSite[]
): void => {
  const schema = body?.schema;
  if (!schema) return;
  const schemaPath = join(path, "schema");
  if (schema.kind === "object") {
    collectFromObject(schema, schemaPath, sites);
  } else {
    collectFromItem(schema, schemaPath, sites);
  }
};

/**
 * Every ref a definition contains, in declaration order.
 * Paths are relative to `basePath` (normally `defs.<name>`).
 */
export const collectReferences = (
  definition: LexDefinition,
  basePath: string
): readonly ReferenceSite[] => {
  const sites: ReferenceSite[] = [];

  switch (definition.kind) {
    case "record":
      collectFromObject(definition.record, join(basePath, "record"), sites);
      break;
    case "query":
      if (definition.parameters) {
        collectFromObject(definition.parameters, join(basePath, "parameters"), sites);
      }
      collectFromBody(definition.output, join(basePath, "output"), sites);
      break;
    case "procedure":
      if (definition.parameters) {
        collectFromObject(definition.parameters, join(basePath, "parameters"), sites);
      }
      collectFromBody(definition.input, join(basePath, "input"), sites);
      collectFromBody(definition.output, join(basePath, "output"), sites);
      break;
    case "subscription":
      if (definition.parameters) {
        collectFromObject(definition.parameters, join(basePath, "parameters"), sites);
      }
      collectFromBody(definition.message, join(basePath, "message"), sites);
      break;
    case "object":
      collectFromObject(definition, basePath, sites);
      break;
    case "token":
      break;
    default:
      collectFromItem(definition, basePath, sites);
  }

  return sites;
};
