/**
 * Pipeline helpers shared by the emitter tests
 */

import {
  ok,
  analyzeLexicons,
  type Diagnostic,
  type Result,
} from "@lexmodel/frontend";
import {
  createFixtureDir,
  removeFixtureDir,
} from "@lexmodel/frontend/test-helpers";
import type { GeneratedUnit, NameTable } from "./types.js";
import { synthesizeUnits } from "./synthesizer/index.js";
import { allocateNames } from "./core/name-allocation.js";

export type SynthesizedFixture = {
  readonly units: readonly GeneratedUnit[];
  readonly names: NameTable;
};

/**
 * Run a fixture directory through resolution, synthesis and naming.
 */
export const synthesizeFixture = (
  files: Record<string, unknown>,
  prefix?: string
): Result<SynthesizedFixture, Diagnostic> => {
  const dir = createFixtureDir(files);
  try {
    const resolution = analyzeLexicons(dir, { prefix });
    if (!resolution.ok) return resolution;

    const units = synthesizeUnits(resolution.value);
    if (!units.ok) return units;

    const names = allocateNames(units.value);
    if (!names.ok) return names;

    return ok({ units: units.value, names: names.value });
  } finally {
    removeFixtureDir(dir);
  }
};

export const findUnit = (
  units: readonly GeneratedUnit[],
  id: string
): GeneratedUnit | undefined => units.find((unit) => unit.id === id);
