/**
 * Type Emitter - renders ResolvedTypes as Python annotations
 */

import type {
  Constraints,
  EnumValue,
  GeneratedUnit,
  NameTable,
  ResolvedType,
  ScalarKind,
  UnionType,
} from "./types.js";
import { DISCRIMINATOR_FIELD } from "./core/identifiers.js";

export type TypingName = "Annotated" | "Any" | "Literal";
export type PydanticName = "BaseModel" | "ConfigDict" | "Field";

/**
 * Names the rendered module uses, collected while emitting.
 */
export type ImportSet = {
  readonly typing: Set<TypingName>;
  readonly pydantic: Set<PydanticName>;
};

export const createImportSet = (): ImportSet => ({
  typing: new Set(),
  pydantic: new Set(),
});

export type TypeEmitContext = {
  readonly names: NameTable;
  readonly units: ReadonlyMap<string, GeneratedUnit>;
  /** Units declared after the current position in the module. */
  readonly pending: ReadonlySet<string>;
  readonly imports: ImportSet;
};

/**
 * `forward` is set when the text names a unit that is not declared yet.
 */
export type EmittedType = {
  readonly text: string;
  readonly forward: boolean;
};

const SCALAR_TYPES: Readonly<Record<ScalarKind, string>> = {
  text: "str",
  integer: "int",
  boolean: "bool",
  bytes: "bytes",
  link: "str",
  blob: "dict[str, Any]",
  unknown: "Any",
};

/**
 * Python string literal. JSON escapes are valid Python escapes.
 */
export const pythonString = (value: string): string => JSON.stringify(value);

export const pythonValue = (value: EnumValue): string => {
  if (typeof value === "string") return pythonString(value);
  if (typeof value === "boolean") return value ? "True" : "False";
  return String(value);
};

/**
 * Pydantic `Field` keyword arguments for a set of bounds. Grapheme bounds
 * have no pydantic counterpart and are not rendered.
 */
export const constraintArguments = (
  constraints: Constraints | undefined
): readonly string[] => {
  if (!constraints) return [];
  const args: string[] = [];
  if (constraints.minLength !== undefined) {
    args.push(`min_length=${constraints.minLength}`);
  }
  if (constraints.maxLength !== undefined) {
    args.push(`max_length=${constraints.maxLength}`);
  }
  if (constraints.minimum !== undefined) args.push(`ge=${constraints.minimum}`);
  if (constraints.maximum !== undefined) args.push(`le=${constraints.maximum}`);
  return args;
};

const plain = (text: string): EmittedType => ({ text, forward: false });

const withConstraints = (
  text: string,
  constraints: Constraints | undefined,
  context: TypeEmitContext
): string => {
  const args = constraintArguments(constraints);
  if (args.length === 0) return text;
  context.imports.typing.add("Annotated");
  context.imports.pydantic.add("Field");
  return `Annotated[${text}, Field(${args.join(", ")})]`;
};

const emitUnitReference = (
  unitId: string,
  context: TypeEmitContext
): EmittedType => ({
  text: context.names.get(unitId)?.name ?? unitId,
  forward: context.pending.has(unitId),
});

/**
 * A closed union of two or more struct units that all carry a `$type` tag
 * becomes a pydantic discriminated union. Open unions also accept any other
 * object.
 */
const emitUnion = (union: UnionType, context: TypeEmitContext): EmittedType => {
  if (union.variants.length === 0) {
    context.imports.typing.add("Any");
    return plain("Any");
  }

  const variants = union.variants.map((variant) =>
    emitUnitReference(variant.unit, context)
  );
  const forward = variants.some((variant) => variant.forward);
  const members = variants.map((variant) => variant.text).join(" | ");

  const discriminated =
    union.closed &&
    union.variants.length >= 2 &&
    union.variants.every((variant) => {
      const unit = context.units.get(variant.unit);
      return unit?.shape.kind === "struct" && unit.discriminator !== undefined;
    });

  if (discriminated) {
    context.imports.typing.add("Annotated");
    context.imports.pydantic.add("Field");
    return {
      text: `Annotated[${members}, Field(discriminator=${pythonString(DISCRIMINATOR_FIELD)})]`,
      forward,
    };
  }

  if (union.closed) {
    return { text: members, forward };
  }

  context.imports.typing.add("Any");
  return { text: `${members} | dict[str, Any]`, forward };
};

/**
 * Render a type. Bounds on the type itself are rendered inline as
 * `Annotated[..., Field(...)]`; field declarations lift the outermost bounds
 * into their own `Field(...)` first.
 */
export const emitType = (
  type: ResolvedType,
  context: TypeEmitContext
): EmittedType => {
  switch (type.kind) {
    case "scalar": {
      const text = SCALAR_TYPES[type.scalar];
      if (type.scalar === "blob" || type.scalar === "unknown") {
        context.imports.typing.add("Any");
      }
      return plain(withConstraints(text, type.constraints, context));
    }
    case "optional": {
      const inner = emitType(type.inner, context);
      return { text: `${inner.text} | None`, forward: inner.forward };
    }
    case "list": {
      const inner = emitType(type.inner, context);
      return {
        text: withConstraints(`list[${inner.text}]`, type.constraints, context),
        forward: inner.forward,
      };
    }
    case "enum":
      context.imports.typing.add("Literal");
      return plain(`Literal[${type.variants.map(pythonValue).join(", ")}]`);
    case "union":
      return emitUnion(type, context);
    case "named":
    case "unresolved":
      return emitUnitReference(type.unit, context);
    case "struct":
      // Structs are always units of their own
      context.imports.typing.add("Any");
      return plain("dict[str, Any]");
  }
};

/**
 * Split the outermost bounds off a field type, looking through `optional`.
 */
export const liftConstraints = (
  type: ResolvedType
): { readonly type: ResolvedType; readonly constraints?: Constraints } => {
  switch (type.kind) {
    case "optional": {
      const lifted = liftConstraints(type.inner);
      return {
        type: { kind: "optional", inner: lifted.type },
        constraints: lifted.constraints,
      };
    }
    case "scalar":
      return {
        type: { kind: "scalar", scalar: type.scalar },
        constraints: type.constraints,
      };
    case "list":
      return {
        type: { kind: "list", inner: type.inner },
        constraints: type.constraints,
      };
    default:
      return { type };
  }
};

/**
 * Wrap a whole annotation in quotes so it is evaluated after every model is
 * declared.
 */
export const quoteAnnotation = (text: string): string =>
  `'${text.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
