/**
 * Unit synthesis - turns each generated def into one or more GeneratedUnits
 */

import {
  ok,
  collect,
  type Diagnostic,
  type LexBody,
  type LexiconDocument,
  type LexNamedDefinition,
  type LexObject,
  type Resolution,
  type ResolvedDocument,
  type Result,
} from "@lexmodel/frontend";
import type {
  GeneratedUnit,
  NestedSuffix,
  ResolvedType,
  UnionType,
  UnitShape,
} from "../types.js";
import {
  collectUnions,
  collectUnitReferences,
  synthesizeStruct,
  synthesizeType,
  type SynthesisContext,
} from "./type-synthesis.js";

/**
 * Value of `$type` (and of a token) for a def: the bare nsid for `main`,
 * `nsid#name` otherwise.
 */
export const discriminatorTag = (nsid: string, defName: string): string =>
  defName === "main" ? nsid : `${nsid}#${defName}`;

const compareCodeUnits = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const dependenciesOf = (shape: UnitShape): readonly string[] => {
  const found = new Set<string>();
  switch (shape.kind) {
    case "struct":
      collectUnitReferences(shape, found);
      break;
    case "alias":
      collectUnitReferences(shape.type, found);
      break;
    case "placeholder":
      break;
  }
  return [...found].sort(compareCodeUnits);
};

const createUnit = (
  document: LexiconDocument,
  defName: string,
  shape: UnitShape,
  description: string | undefined,
  suffix?: NestedSuffix
): GeneratedUnit => {
  const symbol = `${document.nsid}#${defName}`;
  return {
    id: suffix ? `${symbol}/${suffix}` : symbol,
    nsid: document.nsid,
    defName,
    ...(suffix ? { suffix } : {}),
    shape,
    ...(description !== undefined ? { description } : {}),
    dependencies: dependenciesOf(shape),
  };
};

type UnitFactory = {
  readonly document: LexiconDocument;
  readonly defName: string;
  readonly context: SynthesisContext;
};

const structUnit = (
  factory: UnitFactory,
  object: LexObject,
  path: string,
  description: string | undefined,
  suffix?: NestedSuffix
): Result<GeneratedUnit, Diagnostic> => {
  const struct = synthesizeStruct(object, { ...factory.context, path });
  if (!struct.ok) return struct;
  return ok(
    createUnit(
      factory.document,
      factory.defName,
      struct.value,
      description ?? object.description,
      suffix
    )
  );
};

const aliasUnit = (
  factory: UnitFactory,
  type: ResolvedType,
  description: string | undefined,
  suffix?: NestedSuffix
): GeneratedUnit =>
  createUnit(
    factory.document,
    factory.defName,
    { kind: "alias", type },
    description,
    suffix
  );

/**
 * A body without a schema produces no unit.
 */
const bodyUnits = (
  factory: UnitFactory,
  body: LexBody | undefined,
  path: string,
  suffix: NestedSuffix
): Result<readonly GeneratedUnit[], Diagnostic> => {
  const schema = body?.schema;
  if (!schema) return ok([]);

  const schemaPath = `${path}.schema`;
  if (schema.kind === "object") {
    const unit = structUnit(factory, schema, schemaPath, body?.description, suffix);
    return unit.ok ? ok([unit.value]) : unit;
  }

  const type = synthesizeType(schema, { ...factory.context, path: schemaPath });
  if (!type.ok) return type;
  return ok([
    aliasUnit(factory, type.value, body?.description ?? schema.description, suffix),
  ]);
};

const paramsUnits = (
  factory: UnitFactory,
  parameters: LexObject | undefined,
  path: string
): Result<readonly GeneratedUnit[], Diagnostic> => {
  if (!parameters) return ok([]);
  const unit = structUnit(factory, parameters, path, undefined, "Params");
  return unit.ok ? ok([unit.value]) : unit;
};

/**
 * Concatenate unit lists, stopping at the first error.
 */
const concatUnits = (
  parts: readonly (() => Result<readonly GeneratedUnit[], Diagnostic>)[]
): Result<readonly GeneratedUnit[], Diagnostic> => {
  const units: GeneratedUnit[] = [];
  for (const part of parts) {
    const result = part();
    if (!result.ok) return result;
    units.push(...result.value);
  }
  return ok(units);
};

const synthesizeDefinition = (
  document: LexiconDocument,
  named: LexNamedDefinition,
  resolution: Resolution
): Result<readonly GeneratedUnit[], Diagnostic> => {
  const definition = named.definition;
  const base = `defs.${named.name}`;
  const factory: UnitFactory = {
    document,
    defName: named.name,
    context: {
      resolution,
      from: { nsid: document.nsid, name: named.name },
      path: base,
    },
  };

  switch (definition.kind) {
    case "record": {
      const unit = structUnit(
        factory,
        definition.record,
        `${base}.record`,
        definition.description
      );
      return unit.ok ? ok([unit.value]) : unit;
    }
    case "object": {
      const unit = structUnit(factory, definition, base, definition.description);
      return unit.ok ? ok([unit.value]) : unit;
    }
    case "query":
      return concatUnits([
        () => paramsUnits(factory, definition.parameters, `${base}.parameters`),
        () => bodyUnits(factory, definition.output, `${base}.output`, "Output"),
      ]);
    case "procedure":
      return concatUnits([
        () => paramsUnits(factory, definition.parameters, `${base}.parameters`),
        () => bodyUnits(factory, definition.input, `${base}.input`, "Input"),
        () => bodyUnits(factory, definition.output, `${base}.output`, "Output"),
      ]);
    case "subscription":
      return concatUnits([
        () => paramsUnits(factory, definition.parameters, `${base}.parameters`),
        () => bodyUnits(factory, definition.message, `${base}.message`, "Message"),
      ]);
    case "token":
      return ok([
        aliasUnit(
          factory,
          {
            kind: "enum",
            variants: [discriminatorTag(document.nsid, named.name)],
          },
          definition.description
        ),
      ]);
    default: {
      const type = synthesizeType(definition, factory.context);
      if (!type.ok) return type;
      return ok([aliasUnit(factory, type.value, definition.description)]);
    }
  }
};

/**
 * Synthesize the units of one resolved document, in declared def order.
 */
export const synthesizeDocument = (
  resolved: ResolvedDocument,
  resolution: Resolution
): Result<readonly GeneratedUnit[], Diagnostic> =>
  concatUnits(
    resolved.defs.map(
      (def) => () => synthesizeDefinition(resolved.document, def, resolution)
    )
  );

const placeholderUnit = (
  id: string,
  resolution: Resolution
): GeneratedUnit => {
  const symbol = resolution.table.symbols.get(id);
  const [nsid = id, defName = "main"] = id.split("#");
  return {
    id,
    nsid: symbol?.key.nsid ?? nsid,
    defName: symbol?.key.name ?? defName,
    shape: { kind: "placeholder" },
    ...(symbol?.definition.description !== undefined
      ? { description: symbol.definition.description }
      : {}),
    dependencies: [],
  };
};

const unionsOf = (unit: GeneratedUnit): readonly UnionType[] => {
  const unions: UnionType[] = [];
  switch (unit.shape.kind) {
    case "struct":
      collectUnions(unit.shape, unions);
      break;
    case "alias":
      collectUnions(unit.shape.type, unions);
      break;
    case "placeholder":
      break;
  }
  return unions;
};

/**
 * Tag the struct units that appear as union variants with their `$type`.
 */
const assignDiscriminators = (
  units: readonly GeneratedUnit[]
): readonly GeneratedUnit[] => {
  const variants = new Set(
    units.flatMap((unit) =>
      unionsOf(unit).flatMap((union) => union.variants.map((v) => v.unit))
    )
  );

  return units.map((unit) =>
    unit.shape.kind === "struct" && unit.suffix === undefined && variants.has(unit.id)
      ? { ...unit, discriminator: discriminatorTag(unit.nsid, unit.defName) }
      : unit
  );
};

/**
 * Synthesize every generated def of a resolution, plus one placeholder per
 * opaque target.
 */
export const synthesizeUnits = (
  resolution: Resolution
): Result<readonly GeneratedUnit[], Diagnostic> => {
  const documents = collect(resolution.documents, (resolved) =>
    synthesizeDocument(resolved, resolution)
  );
  if (!documents.ok) return documents;

  const placeholders = [...resolution.opaque]
    .sort(compareCodeUnits)
    .map((id) => placeholderUnit(id, resolution));

  return ok(assignDiscriminators([...documents.value.flat(), ...placeholders]));
};
