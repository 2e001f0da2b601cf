/**
 * Name allocation
 *
 * Every unit gets a class name and every struct field an identifier. Two
 * distinct sources mapping to the same text is an error, never an overwrite.
 */

import {
  ok,
  error,
  createDiagnostic,
  type Diagnostic,
  type Result,
} from "@lexmodel/frontend";
import type { AllocatedUnit, GeneratedUnit, NameTable } from "../types.js";
import { toClassName, toFieldName } from "../naming-policy.js";

const compareCodeUnits = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const allocateFields = (
  unit: GeneratedUnit
): Result<ReadonlyMap<string, string>, Diagnostic> => {
  const fields = new Map<string, string>();
  if (unit.shape.kind !== "struct") return ok(fields);

  const owners = new Map<string, string>();

  for (const field of unit.shape.fields) {
    const identifier = toFieldName(field.name);
    const owner = owners.get(identifier);
    if (owner !== undefined) {
      return error(
        createDiagnostic(
          "LEX3001",
          `Properties '${owner}' and '${field.name}' of '${unit.id}' both map to field '${identifier}'`,
          { nsid: unit.nsid, def: unit.defName },
          { hint: "Rename one of the properties" }
        )
      );
    }
    owners.set(identifier, field.name);
    fields.set(field.name, identifier);
  }

  return ok(fields);
};

/**
 * Allocate class and field names for a set of units.
 *
 * Units are visited in id order so the reported pair does not depend on the
 * order units were synthesized in.
 */
export const allocateNames = (
  units: readonly GeneratedUnit[]
): Result<NameTable, Diagnostic> => {
  const table = new Map<string, AllocatedUnit>();
  const owners = new Map<string, GeneratedUnit>();

  const sorted = [...units].sort((a, b) => compareCodeUnits(a.id, b.id));
  for (const unit of sorted) {
    const name = toClassName(unit.nsid, unit.defName, unit.suffix);
    const owner = owners.get(name);
    if (owner !== undefined) {
      return error(
        createDiagnostic(
          "LEX3001",
          `'${owner.id}' and '${unit.id}' both allocate the name '${name}'`,
          { nsid: unit.nsid, def: unit.defName },
          { hint: "Rename one of the definitions or narrow the prefix filter" }
        )
      );
    }
    owners.set(name, unit);

    const fields = allocateFields(unit);
    if (!fields.ok) return fields;
    table.set(unit.id, { name, fields: fields.value });
  }

  return ok(table);
};
