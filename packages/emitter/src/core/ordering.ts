/**
 * Emission order
 *
 * Placeholders come first, by name. The remaining units are grouped into
 * strongly connected components and emitted dependencies-first; among the
 * components that are ready, the one whose smallest member name sorts first
 * goes next. Within a component, struct units precede alias units (so an
 * alias never names a struct declared after it), each group by name.
 */

import { findStronglyConnectedComponents } from "@lexmodel/frontend";
import type { GeneratedUnit, NameTable } from "../types.js";

const compareCodeUnits = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

export const orderUnits = (
  units: readonly GeneratedUnit[],
  names: NameTable
): readonly GeneratedUnit[] => {
  const nameOf = (unit: GeneratedUnit): string =>
    names.get(unit.id)?.name ?? unit.id;
  const byName = (a: GeneratedUnit, b: GeneratedUnit): number =>
    compareCodeUnits(nameOf(a), nameOf(b));
  const structsFirst = (a: GeneratedUnit, b: GeneratedUnit): number => {
    const aStruct = a.shape.kind === "struct";
    const bStruct = b.shape.kind === "struct";
    return aStruct === bStruct ? byName(a, b) : aStruct ? -1 : 1;
  };

  const placeholders = units
    .filter((unit) => unit.shape.kind === "placeholder")
    .sort(byName);
  const declared = units
    .filter((unit) => unit.shape.kind !== "placeholder")
    .sort(byName);

  const declaredIds = new Set(declared.map((unit) => unit.id));
  const unitsById = new Map(declared.map((unit) => [unit.id, unit]));
  const edges = new Map(
    declared.map((unit) => [
      unit.id,
      unit.dependencies.filter((dep) => declaredIds.has(dep)),
    ])
  );

  const components = findStronglyConnectedComponents(
    declared.map((unit) => unit.id),
    edges
  ).map((ids) =>
    ids
      .map((id) => unitsById.get(id))
      .filter((unit): unit is GeneratedUnit => unit !== undefined)
      .sort(structsFirst)
  );

  const componentOf = new Map<string, number>();
  components.forEach((members, index) => {
    members.forEach((unit) => componentOf.set(unit.id, index));
  });

  const waitingOn = components.map((members, index) => {
    const deps = new Set<number>();
    for (const unit of members) {
      for (const dep of edges.get(unit.id) ?? []) {
        const target = componentOf.get(dep);
        if (target !== undefined && target !== index) deps.add(target);
      }
    }
    return deps;
  });

  // A component sorts by its smallest member name
  const keys = components.map(
    (members) => members.map(nameOf).sort(compareCodeUnits)[0] ?? ""
  );

  const ordered: GeneratedUnit[] = [...placeholders];
  const emitted = new Set<number>();
  while (emitted.size < components.length) {
    let next: number | undefined;
    for (const [index, key] of keys.entries()) {
      if (emitted.has(index)) continue;
      const ready = [...(waitingOn[index] ?? [])].every((dep) => emitted.has(dep));
      const current = next !== undefined ? keys[next] : undefined;
      if (ready && (current === undefined || compareCodeUnits(key, current) < 0)) {
        next = index;
      }
    }
    // The condensation is acyclic, so some component is always ready
    if (next === undefined) break;
    emitted.add(next);
    ordered.push(...(components[next] ?? []));
  }

  return ordered;
};
