/**
 * Python Emitter - Public API
 * Renders generated units into a pydantic module and writes it out
 */

import { join } from "node:path";
import {
  ok,
  error,
  collect,
  createDiagnostic,
  type Diagnostic,
  type Result,
} from "@lexmodel/frontend";
import type {
  AllocatedUnit,
  EmittedFile,
  GeneratedUnit,
  NameTable,
  StructField,
  StructType,
  UnitShape,
} from "./types.js";
import { MODELS_FILE, generateFileHeader } from "./constants.js";
import { orderUnits } from "./core/ordering.js";
import { writeFileAtomic } from "./core/file-writer.js";
import { DISCRIMINATOR_FIELD } from "./core/identifiers.js";
import {
  constraintArguments,
  createImportSet,
  emitType,
  liftConstraints,
  pythonString,
  pythonValue,
  quoteAnnotation,
  type ImportSet,
  type TypeEmitContext,
} from "./type-emitter.js";

const INDENT = "    ";

const compareCodeUnits = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const escapeDocstring = (text: string): string => {
  const escaped = text.replace(/\\/g, "\\\\").replace(/"""/g, '\\"\\"\\"');
  return escaped.endsWith('"') ? `${escaped.slice(0, -1)}\\"` : escaped;
};

const LINE_BREAK = /\r\n|\r|\n/;

const renderDocstring = (description: string): string => {
  const lines = escapeDocstring(description.trim()).split(LINE_BREAK);
  return `${INDENT}"""${lines.join(`\n${INDENT}`)}"""`;
};

const renderComment = (description: string | undefined): readonly string[] =>
  description === undefined
    ? []
    : description
        .trim()
        .split(LINE_BREAK)
        .map((line) => `# ${line}`.trimEnd());

type RenderedBlock = {
  readonly text: string;
  /** The block names a unit declared after it. */
  readonly forward: boolean;
};

const renderField = (
  field: StructField,
  identifier: string,
  context: TypeEmitContext
): RenderedBlock => {
  const lifted = liftConstraints(field.type);
  const annotation = emitType(lifted.type, context);
  const annotationText = annotation.forward
    ? quoteAnnotation(annotation.text)
    : annotation.text;

  const defaultText =
    field.default !== undefined ? pythonValue(field.default) : "None";
  const extra = [
    ...(identifier !== field.name ? [`alias=${pythonString(field.name)}`] : []),
    ...constraintArguments(lifted.constraints),
    ...(field.description !== undefined
      ? [`description=${pythonString(field.description)}`]
      : []),
  ];

  const declaration = `${INDENT}${identifier}: ${annotationText}`;
  if (extra.length === 0) {
    return {
      text: field.required ? declaration : `${declaration} = ${defaultText}`,
      forward: annotation.forward,
    };
  }

  context.imports.pydantic.add("Field");
  const args = field.required ? extra : [`default=${defaultText}`, ...extra];
  return {
    text: `${declaration} = Field(${args.join(", ")})`,
    forward: annotation.forward,
  };
};

const renderStruct = (
  unit: GeneratedUnit,
  struct: StructType,
  allocated: AllocatedUnit,
  context: TypeEmitContext
): RenderedBlock => {
  context.imports.pydantic.add("BaseModel");
  context.imports.pydantic.add("ConfigDict");

  const lines: string[] = [`class ${allocated.name}(BaseModel):`];
  if (unit.description !== undefined) {
    lines.push(renderDocstring(unit.description), "");
  }
  lines.push(`${INDENT}model_config = ConfigDict(populate_by_name=True)`);

  const fieldLines: string[] = [];
  if (unit.discriminator !== undefined) {
    context.imports.typing.add("Literal");
    context.imports.pydantic.add("Field");
    const tag = pythonString(unit.discriminator);
    fieldLines.push(
      `${INDENT}${DISCRIMINATOR_FIELD}: Literal[${tag}] = Field(default=${tag}, alias="$type")`
    );
  }

  let forward = false;
  for (const field of struct.fields) {
    const rendered = renderField(
      field,
      allocated.fields.get(field.name) ?? field.name,
      context
    );
    forward = forward || rendered.forward;
    fieldLines.push(rendered.text);
  }

  if (fieldLines.length > 0) {
    lines.push("", ...fieldLines);
  }
  return { text: lines.join("\n"), forward };
};

const renderAlias = (
  unit: GeneratedUnit,
  shape: Exclude<UnitShape, StructType>,
  allocated: AllocatedUnit,
  context: TypeEmitContext
): RenderedBlock => {
  if (shape.kind === "placeholder") {
    context.imports.typing.add("Any");
    return {
      text: [
        `# ${unit.id} is outside the selected namespace prefix`,
        `${allocated.name} = Any`,
      ].join("\n"),
      forward: false,
    };
  }

  const value = emitType(shape.type, context);
  return {
    text: [
      ...renderComment(unit.description),
      `${allocated.name} = ${value.forward ? quoteAnnotation(value.text) : value.text}`,
    ].join("\n"),
    forward: false,
  };
};

const renderImports = (imports: ImportSet): string | undefined => {
  const groups = [
    imports.typing.size > 0
      ? `from typing import ${[...imports.typing].sort(compareCodeUnits).join(", ")}`
      : undefined,
    imports.pydantic.size > 0
      ? `from pydantic import ${[...imports.pydantic].sort(compareCodeUnits).join(", ")}`
      : undefined,
  ].filter((line): line is string => line !== undefined);
  return groups.length > 0 ? groups.join("\n\n") : undefined;
};

/**
 * Every unit must have a name and every dependency must be a unit.
 */
const checkUnits = (
  units: readonly GeneratedUnit[],
  names: NameTable
): Result<void, Diagnostic> => {
  const ids = new Set(units.map((unit) => unit.id));
  for (const unit of units) {
    const location = { nsid: unit.nsid, def: unit.defName };
    if (!names.has(unit.id)) {
      return error(
        createDiagnostic("LEX3001", `No name was allocated for '${unit.id}'`, location)
      );
    }
    const missing = unit.dependencies.find((dep) => !ids.has(dep));
    if (missing !== undefined) {
      return error(
        createDiagnostic(
          "LEX2001",
          `'${unit.id}' references '${missing}', which was not generated`,
          location,
          { ref: missing }
        )
      );
    }
  }
  return ok(undefined);
};

/**
 * Render units into the text of `models.py`. An empty unit set renders no
 * files.
 */
export const renderModels = (
  units: readonly GeneratedUnit[],
  names: NameTable
): Result<readonly EmittedFile[], Diagnostic> => {
  if (units.length === 0) return ok([]);

  const checked = checkUnits(units, names);
  if (!checked.ok) return checked;

  const ordered = orderUnits(units, names);
  const pending = new Set(ordered.map((unit) => unit.id));
  const context: TypeEmitContext = {
    names,
    units: new Map(units.map((unit) => [unit.id, unit])),
    pending,
    imports: createImportSet(),
  };

  const blocks: string[] = [];
  const rebuilds: string[] = [];
  for (const unit of ordered) {
    const allocated = names.get(unit.id) ?? {
      name: unit.id,
      fields: new Map<string, string>(),
    };
    const block =
      unit.shape.kind === "struct"
        ? renderStruct(unit, unit.shape, allocated, context)
        : renderAlias(unit, unit.shape, allocated, context);
    pending.delete(unit.id);

    blocks.push(block.text);
    if (block.forward) {
      rebuilds.push(`${allocated.name}.model_rebuild()`);
    }
  }

  const imports = renderImports(context.imports);
  const content = [
    generateFileHeader().trimEnd(),
    ...(imports !== undefined ? [imports] : []),
  ].join("\n\n");
  const body = [blocks.join("\n\n\n"), ...(rebuilds.length > 0 ? [rebuilds.join("\n")] : [])];

  return ok([
    {
      path: MODELS_FILE,
      content: `${content}\n\n\n${body.join("\n\n\n")}\n`,
    },
  ]);
};

/**
 * Render and write the models into `outputDir`. Returns the written paths.
 */
export const emit = (
  units: readonly GeneratedUnit[],
  names: NameTable,
  outputDir: string
): Result<readonly string[], Diagnostic> => {
  const files = renderModels(units, names);
  if (!files.ok) return files;

  return collect(files.value, (file) =>
    writeFileAtomic(join(outputDir, file.path), file.content)
  );
};
