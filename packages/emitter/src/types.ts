/**
 * Emitter IR
 *
 * The synthesizer turns resolved lexicon defs into GeneratedUnits; the name
 * allocator and the Python emitter only ever look at these types.
 */

export type ScalarKind =
  | "text"
  | "integer"
  | "boolean"
  | "bytes"
  | "link"
  | "blob"
  | "unknown";

/**
 * Validation bounds carried into the output. Grapheme bounds are kept for
 * completeness; pydantic has no grapheme constraint.
 */
export type Constraints = {
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly minGraphemes?: number;
  readonly maxGraphemes?: number;
  readonly minimum?: number;
  readonly maximum?: number;
};

export type EnumValue = string | number | boolean;

export type ScalarType = {
  readonly kind: "scalar";
  readonly scalar: ScalarKind;
  readonly constraints?: Constraints;
};

export type OptionalType = {
  readonly kind: "optional";
  readonly inner: ResolvedType;
};

export type ListType = {
  readonly kind: "list";
  readonly inner: ResolvedType;
  readonly constraints?: Constraints;
};

export type EnumType = {
  readonly kind: "enum";
  readonly variants: readonly EnumValue[];
};

export type StructField = {
  /** Property name as declared in the lexicon. */
  readonly name: string;
  readonly type: ResolvedType;
  readonly required: boolean;
  readonly default?: EnumValue;
  readonly description?: string;
};

export type StructType = {
  readonly kind: "struct";
  readonly fields: readonly StructField[]; // Declared order
};

/**
 * Reference to another generated unit.
 */
export type NamedType = {
  readonly kind: "named";
  readonly unit: string;
};

/**
 * Reference to a def the prefix filter excluded. `unit` is the id of the
 * placeholder unit standing in for it.
 */
export type UnresolvedType = {
  readonly kind: "unresolved";
  readonly symbol: string;
  readonly unit: string;
};

export type UnionVariant = NamedType | UnresolvedType;

export type UnionType = {
  readonly kind: "union";
  readonly variants: readonly UnionVariant[];
  readonly closed: boolean;
  /** Wire field whose value selects the variant. */
  readonly discriminator: "$type";
};

export type ResolvedType =
  | ScalarType
  | OptionalType
  | ListType
  | EnumType
  | StructType
  | UnionType
  | NamedType
  | UnresolvedType;

export type NestedSuffix = "Params" | "Input" | "Output" | "Message";

export type AliasShape = {
  readonly kind: "alias";
  readonly type: ResolvedType;
};

export type PlaceholderShape = {
  readonly kind: "placeholder";
};

export type UnitShape = StructType | AliasShape | PlaceholderShape;

/**
 * One emitted named type.
 *
 * `id` is the symbol id (`nsid#name`) for a def's own unit and
 * `nsid#name/Suffix` for the nested units of XRPC endpoints.
 */
export type GeneratedUnit = {
  readonly id: string;
  readonly nsid: string;
  readonly defName: string;
  readonly suffix?: NestedSuffix;
  readonly shape: UnitShape;
  readonly description?: string;
  /** Unit ids this unit's types name, sorted and distinct. */
  readonly dependencies: readonly string[];
  /** `$type` value, set on struct units that appear in a union. */
  readonly discriminator?: string;
};

export type AllocatedUnit = {
  readonly name: string;
  /** Field identifier by declared property name, struct units only. */
  readonly fields: ReadonlyMap<string, string>;
};

export type NameTable = ReadonlyMap<string, AllocatedUnit>;

export type EmittedFile = {
  /** Path relative to the output directory. */
  readonly path: string;
  readonly content: string;
};
