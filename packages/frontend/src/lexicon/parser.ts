/**
 * Lexicon parser - validates parsed JSON and builds the schema model.
 *
 * The parser checks structure only. Whether refs point anywhere is the
 * resolver's business.
 */

import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { ok, error, collect, type Result } from "../types/result.js";
import { isValidNsid } from "./nsid.js";
import type { KeyOrder } from "./json.js";
import type {
  DocumentOrigin,
  LexArray,
  LexBlob,
  LexBody,
  LexBoolean,
  LexBytes,
  LexDefinition,
  LexInteger,
  LexItem,
  LexiconDocument,
  LexNamedDefinition,
  LexObject,
  LexObjectProperty,
  LexQuery,
  LexProcedure,
  LexRecord,
  LexRef,
  LexString,
  LexSubscription,
  LexUnion,
  LexXrpcError,
  StringFormat,
} from "./types.js";

type JsonObject = { readonly [key: string]: unknown };

type ParseContext = {
  readonly file: string;
  readonly nsid?: string;
  readonly def?: string;
  readonly path: string;
  /** Source order of object keys; `Object.keys` when absent. */
  readonly keys?: KeyOrder;
};

/**
 * Where a type appears. Each position admits a different set of kinds.
 */
type ItemPosition = "property" | "item" | "param";

const STRING_FORMATS: ReadonlySet<string> = new Set<StringFormat>([
  "at-identifier",
  "at-uri",
  "cid",
  "datetime",
  "did",
  "handle",
  "language",
  "nsid",
  "record-key",
  "tid",
  "uri",
]);

const KNOWN_KINDS: ReadonlySet<string> = new Set([
  "record",
  "query",
  "procedure",
  "subscription",
  "object",
  "params",
  "array",
  "string",
  "integer",
  "boolean",
  "bytes",
  "cid-link",
  "blob",
  "union",
  "token",
  "unknown",
  "ref",
]);

const PARAM_KINDS: ReadonlySet<string> = new Set([
  "boolean",
  "integer",
  "string",
  "unknown",
  "array",
]);

const DEF_NAME = /^[a-zA-Z][a-zA-Z0-9]*$/;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isString = (value: unknown): value is string => typeof value === "string";

const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

const isInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value);

const isLength = (value: unknown): value is number =>
  isInteger(value) && value >= 0;

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every(isString);

const isIntegerArray = (value: unknown): value is readonly number[] =>
  Array.isArray(value) && value.every(isInteger);

const entriesOf = (
  obj: JsonObject,
  ctx: ParseContext
): readonly (readonly [string, unknown])[] =>
  (ctx.keys ?? Object.keys)(obj).map((key) => [key, obj[key]] as const);

const child = (ctx: ParseContext, key: string): ParseContext => ({
  ...ctx,
  path: ctx.path.length > 0 ? `${ctx.path}.${key}` : key,
});

const malformed = <T>(ctx: ParseContext, message: string): Result<T, Diagnostic> =>
  error(
    createDiagnostic("LEX1003", message, {
      file: ctx.file,
      nsid: ctx.nsid,
      def: ctx.def,
      path: ctx.path,
    })
  );

const unsupported = <T>(
  ctx: ParseContext,
  message: string
): Result<T, Diagnostic> =>
  error(
    createDiagnostic("LEX2002", message, {
      file: ctx.file,
      nsid: ctx.nsid,
      def: ctx.def,
      path: ctx.path,
    })
  );

/**
 * Read an optional field, failing when it is present with the wrong shape.
 */
const readOptional = <T>(
  obj: JsonObject,
  key: string,
  ctx: ParseContext,
  guard: (value: unknown) => value is T,
  expected: string
): Result<T | undefined, Diagnostic> => {
  const value = obj[key];
  if (value === undefined) return ok(undefined);
  if (!guard(value)) {
    return malformed(child(ctx, key), `'${key}' must be ${expected}`);
  }
  return ok(value);
};

const readKind = (
  value: unknown,
  ctx: ParseContext
): Result<{ readonly obj: JsonObject; readonly kind: string }, Diagnostic> => {
  if (!isJsonObject(value)) {
    return malformed(ctx, "Type definition must be an object");
  }
  const kind = value.type;
  if (!isString(kind)) {
    return malformed(ctx, "Missing or invalid 'type' field");
  }
  if (!KNOWN_KINDS.has(kind)) {
    return unsupported(ctx, `Unknown type '${kind}'`);
  }
  return ok({ obj: value, kind });
};

const checkBounds = (
  ctx: ParseContext,
  low: number | undefined,
  high: number | undefined,
  lowName: string,
  highName: string
): Result<void, Diagnostic> =>
  low !== undefined && high !== undefined && low > high
    ? malformed(ctx, `'${lowName}' (${low}) exceeds '${highName}' (${high})`)
    : ok(undefined);

const parseBoolean = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexBoolean, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const def = readOptional(obj, "default", ctx, isBoolean, "a boolean");
  if (!def.ok) return def;
  const constant = readOptional(obj, "const", ctx, isBoolean, "a boolean");
  if (!constant.ok) return constant;

  return ok({
    kind: "boolean",
    description: description.value,
    default: def.value,
    const: constant.value,
  });
};

const parseInteger = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexInteger, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const def = readOptional(obj, "default", ctx, isInteger, "an integer");
  if (!def.ok) return def;
  const minimum = readOptional(obj, "minimum", ctx, isInteger, "an integer");
  if (!minimum.ok) return minimum;
  const maximum = readOptional(obj, "maximum", ctx, isInteger, "an integer");
  if (!maximum.ok) return maximum;
  const values = readOptional(obj, "enum", ctx, isIntegerArray, "an array of integers");
  if (!values.ok) return values;
  const constant = readOptional(obj, "const", ctx, isInteger, "an integer");
  if (!constant.ok) return constant;

  const bounds = checkBounds(ctx, minimum.value, maximum.value, "minimum", "maximum");
  if (!bounds.ok) return bounds;
  if (values.value?.length === 0) {
    return unsupported(child(ctx, "enum"), "'enum' must list at least one value");
  }
  if (values.value !== undefined && constant.value !== undefined) {
    return unsupported(ctx, "'enum' and 'const' cannot be combined");
  }

  return ok({
    kind: "integer",
    description: description.value,
    default: def.value,
    minimum: minimum.value,
    maximum: maximum.value,
    enum: values.value,
    const: constant.value,
  });
};

const parseString = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexString, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const format = readOptional(obj, "format", ctx, isString, "a string");
  if (!format.ok) return format;
  const def = readOptional(obj, "default", ctx, isString, "a string");
  if (!def.ok) return def;
  const minLength = readOptional(obj, "minLength", ctx, isLength, "a non-negative integer");
  if (!minLength.ok) return minLength;
  const maxLength = readOptional(obj, "maxLength", ctx, isLength, "a non-negative integer");
  if (!maxLength.ok) return maxLength;
  const minGraphemes = readOptional(obj, "minGraphemes", ctx, isLength, "a non-negative integer");
  if (!minGraphemes.ok) return minGraphemes;
  const maxGraphemes = readOptional(obj, "maxGraphemes", ctx, isLength, "a non-negative integer");
  if (!maxGraphemes.ok) return maxGraphemes;
  const values = readOptional(obj, "enum", ctx, isStringArray, "an array of strings");
  if (!values.ok) return values;
  const constant = readOptional(obj, "const", ctx, isString, "a string");
  if (!constant.ok) return constant;
  const knownValues = readOptional(obj, "knownValues", ctx, isStringArray, "an array of strings");
  if (!knownValues.ok) return knownValues;

  const formatValue = format.value;
  if (formatValue !== undefined && !isStringFormat(formatValue)) {
    return unsupported(child(ctx, "format"), `Unknown string format '${formatValue}'`);
  }
  const lengths = checkBounds(ctx, minLength.value, maxLength.value, "minLength", "maxLength");
  if (!lengths.ok) return lengths;
  const graphemes = checkBounds(
    ctx,
    minGraphemes.value,
    maxGraphemes.value,
    "minGraphemes",
    "maxGraphemes"
  );
  if (!graphemes.ok) return graphemes;
  if (values.value?.length === 0) {
    return unsupported(child(ctx, "enum"), "'enum' must list at least one value");
  }
  if (values.value !== undefined && constant.value !== undefined) {
    return unsupported(ctx, "'enum' and 'const' cannot be combined");
  }

  return ok({
    kind: "string",
    description: description.value,
    format: formatValue,
    default: def.value,
    minLength: minLength.value,
    maxLength: maxLength.value,
    minGraphemes: minGraphemes.value,
    maxGraphemes: maxGraphemes.value,
    enum: values.value,
    const: constant.value,
    knownValues: knownValues.value,
  });
};

const isStringFormat = (value: string): value is StringFormat =>
  STRING_FORMATS.has(value);

const parseBytes = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexBytes, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const minLength = readOptional(obj, "minLength", ctx, isLength, "a non-negative integer");
  if (!minLength.ok) return minLength;
  const maxLength = readOptional(obj, "maxLength", ctx, isLength, "a non-negative integer");
  if (!maxLength.ok) return maxLength;
  const bounds = checkBounds(ctx, minLength.value, maxLength.value, "minLength", "maxLength");
  if (!bounds.ok) return bounds;

  return ok({
    kind: "bytes",
    description: description.value,
    minLength: minLength.value,
    maxLength: maxLength.value,
  });
};

const parseBlob = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexBlob, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const accept = readOptional(obj, "accept", ctx, isStringArray, "an array of strings");
  if (!accept.ok) return accept;
  const maxSize = readOptional(obj, "maxSize", ctx, isLength, "a non-negative integer");
  if (!maxSize.ok) return maxSize;

  return ok({
    kind: "blob",
    description: description.value,
    accept: accept.value,
    maxSize: maxSize.value,
  });
};

const parseRef = (obj: JsonObject, ctx: ParseContext): Result<LexRef, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const ref = obj.ref;
  if (!isString(ref)) {
    return malformed(child(ctx, "ref"), "Missing or invalid 'ref' field");
  }
  return ok({ kind: "ref", description: description.value, ref });
};

const parseUnion = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexUnion, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const refs = obj.refs;
  if (!isStringArray(refs)) {
    return malformed(child(ctx, "refs"), "'refs' must be an array of strings");
  }
  const closed = readOptional(obj, "closed", ctx, isBoolean, "a boolean");
  if (!closed.ok) return closed;

  return ok({
    kind: "union",
    description: description.value,
    refs,
    closed: closed.value ?? false,
  });
};

const parseArray = (
  obj: JsonObject,
  ctx: ParseContext,
  position: ItemPosition
): Result<LexArray, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const minLength = readOptional(obj, "minLength", ctx, isLength, "a non-negative integer");
  if (!minLength.ok) return minLength;
  const maxLength = readOptional(obj, "maxLength", ctx, isLength, "a non-negative integer");
  if (!maxLength.ok) return maxLength;
  const bounds = checkBounds(ctx, minLength.value, maxLength.value, "minLength", "maxLength");
  if (!bounds.ok) return bounds;

  if (obj.items === undefined) {
    return malformed(child(ctx, "items"), "Array is missing 'items'");
  }
  const items = parseItem(obj.items, child(ctx, "items"), position === "param" ? "param" : "item");
  if (!items.ok) return items;

  return ok({
    kind: "array",
    description: description.value,
    items: items.value,
    minLength: minLength.value,
    maxLength: maxLength.value,
  });
};

const POSITION_LABELS: Readonly<Record<ItemPosition, string>> = {
  property: "an object property",
  item: "an array item",
  param: "a query parameter",
};

/**
 * Parse a type used inside an object, array or params block.
 */
const parseItem = (
  value: unknown,
  ctx: ParseContext,
  position: ItemPosition
): Result<LexItem, Diagnostic> => {
  const head = readKind(value, ctx);
  if (!head.ok) return head;
  const { obj, kind } = head.value;

  if (position === "param" && !PARAM_KINDS.has(kind)) {
    return unsupported(ctx, `'${kind}' is not allowed as ${POSITION_LABELS[position]}`);
  }

  switch (kind) {
    case "boolean":
      return parseBoolean(obj, ctx);
    case "integer":
      return parseInteger(obj, ctx);
    case "string":
      return parseString(obj, ctx);
    case "bytes":
      return parseBytes(obj, ctx);
    case "blob":
      return parseBlob(obj, ctx);
    case "cid-link": {
      const description = readOptional(obj, "description", ctx, isString, "a string");
      if (!description.ok) return description;
      return ok({ kind: "cid-link", description: description.value });
    }
    case "unknown": {
      const description = readOptional(obj, "description", ctx, isString, "a string");
      if (!description.ok) return description;
      return ok({ kind: "unknown", description: description.value });
    }
    case "ref":
      return parseRef(obj, ctx);
    case "union":
      return parseUnion(obj, ctx);
    case "array":
      return parseArray(obj, ctx, position);
    default:
      return unsupported(ctx, `'${kind}' is not allowed as ${POSITION_LABELS[position]}`);
  }
};

const parseProperties = (
  obj: JsonObject,
  ctx: ParseContext,
  position: ItemPosition
): Result<readonly LexObjectProperty[], Diagnostic> => {
  const properties = obj.properties;
  if (properties === undefined) return ok([]);
  if (!isJsonObject(properties)) {
    return malformed(child(ctx, "properties"), "'properties' must be an object");
  }
  const propertiesCtx = child(ctx, "properties");
  return collect(
    entriesOf(properties, ctx),
    ([name, value]): Result<LexObjectProperty, Diagnostic> => {
      const parsed = parseItem(value, child(propertiesCtx, name), position);
      return parsed.ok ? ok({ name, type: parsed.value }) : parsed;
    }
  );
};

const checkNamesDeclared = (
  names: readonly string[],
  properties: readonly LexObjectProperty[],
  ctx: ParseContext,
  listName: string
): Result<void, Diagnostic> => {
  const declared = new Set(properties.map((p) => p.name));
  const missing = names.find((name) => !declared.has(name));
  return missing !== undefined
    ? malformed(child(ctx, listName), `'${listName}' names undeclared property '${missing}'`)
    : ok(undefined);
};

/**
 * Parse an `object` (or a `params` block when `position` is "param").
 */
const parseObject = (
  value: unknown,
  ctx: ParseContext,
  position: "property" | "param"
): Result<LexObject, Diagnostic> => {
  const head = readKind(value, ctx);
  if (!head.ok) return head;
  const { obj, kind } = head.value;

  const expected = position === "param" ? "params" : "object";
  if (kind !== expected) {
    return unsupported(ctx, `Expected '${expected}', found '${kind}'`);
  }

  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const required = readOptional(obj, "required", ctx, isStringArray, "an array of strings");
  if (!required.ok) return required;
  const nullable = readOptional(obj, "nullable", ctx, isStringArray, "an array of strings");
  if (!nullable.ok) return nullable;

  const properties = parseProperties(obj, ctx, position);
  if (!properties.ok) return properties;

  const requiredNames = required.value ?? [];
  const nullableNames = nullable.value ?? [];
  const requiredCheck = checkNamesDeclared(requiredNames, properties.value, ctx, "required");
  if (!requiredCheck.ok) return requiredCheck;
  const nullableCheck = checkNamesDeclared(nullableNames, properties.value, ctx, "nullable");
  if (!nullableCheck.ok) return nullableCheck;

  return ok({
    kind: "object",
    description: description.value,
    properties: properties.value,
    required: requiredNames,
    nullable: nullableNames,
  });
};

/**
 * Parse an XRPC body. Subscription messages carry no `encoding`.
 */
const readBody = (
  value: unknown,
  ctx: ParseContext,
  encodingRequired: boolean
): Result<LexBody, Diagnostic> => {
  if (!isJsonObject(value)) {
    return malformed(ctx, "Body must be an object");
  }
  const encodingField = readOptional(value, "encoding", ctx, isString, "a string");
  if (!encodingField.ok) return encodingField;
  const encoding = encodingField.value;
  if (encodingRequired && encoding === undefined) {
    return malformed(child(ctx, "encoding"), "Missing or invalid 'encoding' field");
  }
  const description = readOptional(value, "description", ctx, isString, "a string");
  if (!description.ok) return description;

  if (value.schema === undefined) {
    return ok({ encoding, description: description.value });
  }

  const schemaCtx = child(ctx, "schema");
  const head = readKind(value.schema, schemaCtx);
  if (!head.ok) return head;

  switch (head.value.kind) {
    case "object": {
      const schema = parseObject(value.schema, schemaCtx, "property");
      return schema.ok
        ? ok({ encoding, description: description.value, schema: schema.value })
        : schema;
    }
    case "ref": {
      const schema = parseRef(head.value.obj, schemaCtx);
      return schema.ok
        ? ok({ encoding, description: description.value, schema: schema.value })
        : schema;
    }
    case "union": {
      const schema = parseUnion(head.value.obj, schemaCtx);
      return schema.ok
        ? ok({ encoding, description: description.value, schema: schema.value })
        : schema;
    }
    default:
      return unsupported(schemaCtx, `'${head.value.kind}' is not allowed as a body schema`);
  }
};

const parseBody = (value: unknown, ctx: ParseContext): Result<LexBody, Diagnostic> =>
  readBody(value, ctx, true);

const parseMessage = (value: unknown, ctx: ParseContext): Result<LexBody, Diagnostic> =>
  readBody(value, ctx, false);

const parseErrors = (
  obj: JsonObject,
  ctx: ParseContext
): Result<readonly LexXrpcError[], Diagnostic> => {
  const errors = obj.errors;
  if (errors === undefined) return ok([]);
  if (!Array.isArray(errors)) {
    return malformed(child(ctx, "errors"), "'errors' must be an array");
  }
  return collect(errors, (entry: unknown, index): Result<LexXrpcError, Diagnostic> => {
    const entryCtx = child(ctx, `errors.${index}`);
    if (!isJsonObject(entry) || !isString(entry.name)) {
      return malformed(entryCtx, "Error entry must have a string 'name'");
    }
    const description = readOptional(entry, "description", entryCtx, isString, "a string");
    if (!description.ok) return description;
    return ok({ name: entry.name, description: description.value });
  });
};

const parseOptional = <T>(
  obj: JsonObject,
  key: string,
  ctx: ParseContext,
  parse: (value: unknown, ctx: ParseContext) => Result<T, Diagnostic>
): Result<T | undefined, Diagnostic> =>
  obj[key] === undefined ? ok(undefined) : parse(obj[key], child(ctx, key));

const parseParams = (value: unknown, ctx: ParseContext): Result<LexObject, Diagnostic> =>
  parseObject(value, ctx, "param");

const parseRecord = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexRecord, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const key = readOptional(obj, "key", ctx, isString, "a string");
  if (!key.ok) return key;
  if (obj.record === undefined) {
    return malformed(child(ctx, "record"), "Record is missing 'record'");
  }
  const record = parseObject(obj.record, child(ctx, "record"), "property");
  if (!record.ok) return record;

  return ok({
    kind: "record",
    description: description.value,
    key: key.value,
    record: record.value,
  });
};

const parseQuery = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexQuery, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const parameters = parseOptional(obj, "parameters", ctx, parseParams);
  if (!parameters.ok) return parameters;
  const output = parseOptional(obj, "output", ctx, parseBody);
  if (!output.ok) return output;
  const errors = parseErrors(obj, ctx);
  if (!errors.ok) return errors;

  return ok({
    kind: "query",
    description: description.value,
    parameters: parameters.value,
    output: output.value,
    errors: errors.value,
  });
};

const parseProcedure = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexProcedure, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const parameters = parseOptional(obj, "parameters", ctx, parseParams);
  if (!parameters.ok) return parameters;
  const input = parseOptional(obj, "input", ctx, parseBody);
  if (!input.ok) return input;
  const output = parseOptional(obj, "output", ctx, parseBody);
  if (!output.ok) return output;
  const errors = parseErrors(obj, ctx);
  if (!errors.ok) return errors;

  return ok({
    kind: "procedure",
    description: description.value,
    parameters: parameters.value,
    input: input.value,
    output: output.value,
    errors: errors.value,
  });
};

const parseSubscription = (
  obj: JsonObject,
  ctx: ParseContext
): Result<LexSubscription, Diagnostic> => {
  const description = readOptional(obj, "description", ctx, isString, "a string");
  if (!description.ok) return description;
  const parameters = parseOptional(obj, "parameters", ctx, parseParams);
  if (!parameters.ok) return parameters;
  const message = parseOptional(obj, "message", ctx, parseMessage);
  if (!message.ok) return message;
  const errors = parseErrors(obj, ctx);
  if (!errors.ok) return errors;

  return ok({
    kind: "subscription",
    description: description.value,
    parameters: parameters.value,
    message: message.value,
    errors: errors.value,
  });
};

/**
 * Parse one entry of a document's `defs`.
 */
export const parseDefinition = (
  value: unknown,
  ctx: ParseContext,
  name: string
): Result<LexDefinition, Diagnostic> => {
  const head = readKind(value, ctx);
  if (!head.ok) return head;
  const { obj, kind } = head.value;

  switch (kind) {
    case "record":
    case "query":
    case "procedure":
    case "subscription":
      if (name !== "main") {
        return unsupported(ctx, `'${kind}' is only allowed as the main definition`);
      }
      return kind === "record"
        ? parseRecord(obj, ctx)
        : kind === "query"
          ? parseQuery(obj, ctx)
          : kind === "procedure"
            ? parseProcedure(obj, ctx)
            : parseSubscription(obj, ctx);
    case "object":
      return parseObject(obj, ctx, "property");
    case "token": {
      const description = readOptional(obj, "description", ctx, isString, "a string");
      if (!description.ok) return description;
      return ok({ kind: "token", description: description.value });
    }
    case "params":
      return unsupported(ctx, "'params' is only allowed as query parameters");
    default:
      return parseItem(obj, ctx, "property");
  }
};

/**
 * Validate a parsed JSON value as a lexicon document.
 */
export const parseLexiconDocument = (
  raw: unknown,
  filePath: string,
  origin: DocumentOrigin,
  keys?: KeyOrder
): Result<LexiconDocument, Diagnostic> => {
  const ctx: ParseContext = { file: filePath, path: "", keys };

  if (!isJsonObject(raw)) {
    return malformed(ctx, "Lexicon document must be a JSON object");
  }

  if (raw.lexicon !== 1) {
    return malformed(child(ctx, "lexicon"), "Missing or unsupported 'lexicon' version (expected 1)");
  }

  const nsid = raw.id;
  if (!isString(nsid)) {
    return malformed(child(ctx, "id"), "Missing or invalid 'id' field");
  }
  if (!isValidNsid(nsid)) {
    return malformed(child(ctx, "id"), `'${nsid}' is not a valid NSID`);
  }

  const docCtx: ParseContext = { ...ctx, nsid };
  const revision = readOptional(raw, "revision", docCtx, isInteger, "an integer");
  if (!revision.ok) return revision;
  const description = readOptional(raw, "description", docCtx, isString, "a string");
  if (!description.ok) return description;

  const defs = raw.defs;
  if (!isJsonObject(defs)) {
    return malformed(child(docCtx, "defs"), "Missing or invalid 'defs' field");
  }

  const parsedDefs = collect(
    entriesOf(defs, docCtx),
    ([name, value]): Result<LexNamedDefinition, Diagnostic> => {
      const defCtx: ParseContext = { ...docCtx, def: name, path: `defs.${name}` };
      if (!DEF_NAME.test(name)) {
        return malformed(defCtx, `'${name}' is not a valid definition name`);
      }
      const definition = parseDefinition(value, defCtx, name);
      return definition.ok ? ok({ name, definition: definition.value }) : definition;
    }
  );
  if (!parsedDefs.ok) return parsedDefs;

  return ok({
    nsid,
    revision: revision.value,
    description: description.value,
    defs: parsedDefs.value,
    filePath,
    origin,
  });
};
