/**
 * Lexicon schema model
 *
 * Typed form of a parsed lexicon document. Definitions are a closed union
 * discriminated by `kind`; the `kind` values are the lexicon `type` strings.
 */

export type StringFormat =
  | "at-identifier"
  | "at-uri"
  | "cid"
  | "datetime"
  | "did"
  | "handle"
  | "language"
  | "nsid"
  | "record-key"
  | "tid"
  | "uri";

export type LexBoolean = {
  readonly kind: "boolean";
  readonly description?: string;
  readonly default?: boolean;
  readonly const?: boolean;
};

export type LexInteger = {
  readonly kind: "integer";
  readonly description?: string;
  readonly default?: number;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly enum?: readonly number[];
  readonly const?: number;
};

export type LexString = {
  readonly kind: "string";
  readonly description?: string;
  readonly format?: StringFormat;
  readonly default?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly minGraphemes?: number;
  readonly maxGraphemes?: number;
  readonly enum?: readonly string[];
  readonly const?: string;
  readonly knownValues?: readonly string[];
};

export type LexBytes = {
  readonly kind: "bytes";
  readonly description?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
};

export type LexCidLink = {
  readonly kind: "cid-link";
  readonly description?: string;
};

export type LexBlob = {
  readonly kind: "blob";
  readonly description?: string;
  readonly accept?: readonly string[];
  readonly maxSize?: number;
};

export type LexUnknown = {
  readonly kind: "unknown";
  readonly description?: string;
};

export type LexToken = {
  readonly kind: "token";
  readonly description?: string;
};

export type LexRef = {
  readonly kind: "ref";
  readonly description?: string;
  readonly ref: string;
};

export type LexUnion = {
  readonly kind: "union";
  readonly description?: string;
  readonly refs: readonly string[];
  readonly closed: boolean;
};

export type LexScalar =
  | LexBoolean
  | LexInteger
  | LexString
  | LexBytes
  | LexCidLink
  | LexBlob
  | LexUnknown;

/**
 * Types allowed as array items.
 */
export type LexItem = LexScalar | LexRef | LexUnion | LexArray;

export type LexArray = {
  readonly kind: "array";
  readonly description?: string;
  readonly items: LexItem;
  readonly minLength?: number;
  readonly maxLength?: number;
};

/**
 * Types allowed as object properties.
 */
export type LexProperty = LexItem;

export type LexObjectProperty = {
  readonly name: string;
  readonly type: LexProperty;
};

export type LexObject = {
  readonly kind: "object";
  readonly description?: string;
  readonly properties: readonly LexObjectProperty[]; // Declared order
  readonly required: readonly string[];
  readonly nullable: readonly string[];
};

export type LexBodySchema = LexObject | LexRef | LexUnion;

export type LexBody = {
  readonly encoding?: string; // Absent on subscription messages
  readonly description?: string;
  readonly schema?: LexBodySchema;
};

export type LexXrpcError = {
  readonly name: string;
  readonly description?: string;
};

export type LexRecord = {
  readonly kind: "record";
  readonly description?: string;
  readonly key?: string;
  readonly record: LexObject;
};

export type LexQuery = {
  readonly kind: "query";
  readonly description?: string;
  readonly parameters?: LexObject;
  readonly output?: LexBody;
  readonly errors: readonly LexXrpcError[];
};

export type LexProcedure = {
  readonly kind: "procedure";
  readonly description?: string;
  readonly parameters?: LexObject;
  readonly input?: LexBody;
  readonly output?: LexBody;
  readonly errors: readonly LexXrpcError[];
};

export type LexSubscription = {
  readonly kind: "subscription";
  readonly description?: string;
  readonly parameters?: LexObject;
  readonly message?: LexBody;
  readonly errors: readonly LexXrpcError[];
};

export type LexDefinition =
  | LexRecord
  | LexQuery
  | LexProcedure
  | LexSubscription
  | LexObject
  | LexArray
  | LexToken
  | LexRef
  | LexUnion
  | LexScalar;

export type LexDefinitionKind = LexDefinition["kind"];

export type LexNamedDefinition = {
  readonly name: string;
  readonly definition: LexDefinition;
};

export type DocumentOrigin = "input" | "builtin";

export type LexiconDocument = {
  readonly nsid: string;
  readonly revision?: number;
  readonly description?: string;
  readonly defs: readonly LexNamedDefinition[]; // Declared order
  readonly filePath: string;
  readonly origin: DocumentOrigin;
};

export type LexiconSet = {
  readonly documents: readonly LexiconDocument[]; // Sorted by nsid
};

export const findDefinition = (
  document: LexiconDocument,
  name: string
): LexDefinition | undefined =>
  document.defs.find((d) => d.name === name)?.definition;
