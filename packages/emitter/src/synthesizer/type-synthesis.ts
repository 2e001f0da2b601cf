/**
 * Type synthesis - maps schema model items to ResolvedTypes
 */

import {
  ok,
  collect,
  resolveReference,
  type Diagnostic,
  type LexArray,
  type LexItem,
  type LexObject,
  type LexUnion,
  type Resolution,
  type Result,
  type SymbolKey,
} from "@lexmodel/frontend";
import type {
  Constraints,
  EnumValue,
  ResolvedType,
  StructField,
  StructType,
  UnionType,
  UnionVariant,
} from "../types.js";

/**
 * Where synthesis is happening: the def being synthesized and the JSON path
 * of the current node, used to resolve refs and to locate errors.
 */
export type SynthesisContext = {
  readonly resolution: Resolution;
  readonly from: SymbolKey;
  readonly path: string;
};

const at = (context: SynthesisContext, key: string): SynthesisContext => ({
  ...context,
  path: context.path.length > 0 ? `${context.path}.${key}` : key,
});

const CONSTRAINT_KEYS: readonly (keyof Constraints)[] = [
  "minLength",
  "maxLength",
  "minGraphemes",
  "maxGraphemes",
  "minimum",
  "maximum",
];

/**
 * Drop unset bounds; undefined when nothing is left.
 */
const compactConstraints = (bounds: Constraints): Constraints | undefined => {
  const compact: { -readonly [K in keyof Constraints]: Constraints[K] } = {};
  for (const key of CONSTRAINT_KEYS) {
    const value = bounds[key];
    if (value !== undefined) {
      compact[key] = value;
    }
  }
  return Object.keys(compact).length > 0 ? compact : undefined;
};

const scalarWith = (
  scalar: "text" | "integer" | "bytes",
  bounds: Constraints
): ResolvedType => {
  const constraints = compactConstraints(bounds);
  return constraints
    ? { kind: "scalar", scalar, constraints }
    : { kind: "scalar", scalar };
};

const enumOf = (variants: readonly EnumValue[]): ResolvedType => ({
  kind: "enum",
  variants,
});

const resolveVariant = (
  ref: string,
  context: SynthesisContext
): Result<UnionVariant, Diagnostic> => {
  const { resolution, from, path } = context;
  const target = resolveReference(resolution.table, from, { ref, path });
  if (!target.ok) return target;

  const id = target.value.id;
  return resolution.generated.has(id)
    ? ok({ kind: "named", unit: id })
    : ok({ kind: "unresolved", symbol: id, unit: id });
};

const synthesizeUnion = (
  union: LexUnion,
  context: SynthesisContext
): Result<UnionType, Diagnostic> => {
  const variants = collect(union.refs, (ref, i) =>
    resolveVariant(ref, at(context, `refs.${i}`))
  );
  if (!variants.ok) return variants;

  return ok({
    kind: "union",
    variants: variants.value,
    closed: union.closed,
    discriminator: "$type",
  });
};

const synthesizeArray = (
  array: LexArray,
  context: SynthesisContext
): Result<ResolvedType, Diagnostic> => {
  const inner = synthesizeType(array.items, at(context, "items"));
  if (!inner.ok) return inner;

  const constraints = compactConstraints({
    minLength: array.minLength,
    maxLength: array.maxLength,
  });
  return ok(
    constraints
      ? { kind: "list", inner: inner.value, constraints }
      : { kind: "list", inner: inner.value }
  );
};

/**
 * Synthesize the type of an object property, array item, param or alias def.
 */
export const synthesizeType = (
  item: LexItem,
  context: SynthesisContext
): Result<ResolvedType, Diagnostic> => {
  switch (item.kind) {
    case "boolean":
      return ok(
        item.const !== undefined
          ? enumOf([item.const])
          : { kind: "scalar", scalar: "boolean" }
      );
    case "integer":
      if (item.enum) return ok(enumOf(item.enum));
      if (item.const !== undefined) return ok(enumOf([item.const]));
      return ok(
        scalarWith("integer", { minimum: item.minimum, maximum: item.maximum })
      );
    case "string":
      if (item.enum) return ok(enumOf(item.enum));
      if (item.const !== undefined) return ok(enumOf([item.const]));
      return ok(
        scalarWith("text", {
          minLength: item.minLength,
          maxLength: item.maxLength,
          minGraphemes: item.minGraphemes,
          maxGraphemes: item.maxGraphemes,
        })
      );
    case "bytes":
      return ok(
        scalarWith("bytes", {
          minLength: item.minLength,
          maxLength: item.maxLength,
        })
      );
    case "cid-link":
      return ok({ kind: "scalar", scalar: "link" });
    case "blob":
      return ok({ kind: "scalar", scalar: "blob" });
    case "unknown":
      return ok({ kind: "scalar", scalar: "unknown" });
    case "ref":
      return resolveVariant(item.ref, context);
    case "union":
      return synthesizeUnion(item, context);
    case "array":
      return synthesizeArray(item, context);
  }
};

const defaultOf = (item: LexItem): EnumValue | undefined => {
  switch (item.kind) {
    case "boolean":
    case "integer":
    case "string":
      return item.default;
    default:
      return undefined;
  }
};

/**
 * Synthesize an object into a struct. A field is optional unless its name is
 * in `required`; a `nullable` field admits null but keeps its requiredness.
 */
export const synthesizeStruct = (
  object: LexObject,
  context: SynthesisContext
): Result<StructType, Diagnostic> => {
  const required = new Set(object.required);
  const nullable = new Set(object.nullable);
  const propertiesContext = at(context, "properties");

  const fields = collect(
    object.properties,
    (property): Result<StructField, Diagnostic> => {
      const type = synthesizeType(
        property.type,
        at(propertiesContext, property.name)
      );
      if (!type.ok) return type;

      const isRequired = required.has(property.name);
      const fieldType: ResolvedType =
        isRequired && !nullable.has(property.name)
          ? type.value
          : { kind: "optional", inner: type.value };

      const field: StructField = {
        name: property.name,
        type: fieldType,
        required: isRequired,
      };
      const defaultValue = defaultOf(property.type);
      const description = property.type.description;
      return ok({
        ...field,
        ...(defaultValue !== undefined ? { default: defaultValue } : {}),
        ...(description !== undefined ? { description } : {}),
      });
    }
  );
  if (!fields.ok) return fields;

  return ok({ kind: "struct", fields: fields.value });
};

/**
 * Unit ids named anywhere inside a type.
 */
export const collectUnitReferences = (
  type: ResolvedType,
  into: Set<string>
): void => {
  switch (type.kind) {
    case "named":
    case "unresolved":
      into.add(type.unit);
      return;
    case "optional":
    case "list":
      collectUnitReferences(type.inner, into);
      return;
    case "union":
      type.variants.forEach((variant) => collectUnitReferences(variant, into));
      return;
    case "struct":
      type.fields.forEach((field) => collectUnitReferences(field.type, into));
      return;
    case "scalar":
    case "enum":
      return;
  }
};

/**
 * Every union inside a type, outermost first.
 */
export const collectUnions = (
  type: ResolvedType,
  into: UnionType[]
): void => {
  switch (type.kind) {
    case "union":
      into.push(type);
      return;
    case "optional":
    case "list":
      collectUnions(type.inner, into);
      return;
    case "struct":
      type.fields.forEach((field) => collectUnions(field.type, into));
      return;
    case "scalar":
    case "enum":
    case "named":
    case "unresolved":
      return;
  }
};
