import { describe, it } from "mocha";
import { expect } from "chai";
import type { GeneratedUnit, NameTable, UnitShape } from "../types.js";
import { orderUnits } from "./ordering.js";

const unit = (
  id: string,
  shape: UnitShape,
  dependencies: readonly string[] = []
): GeneratedUnit => {
  const [nsid = id, defName = "main"] = id.split("#");
  return { id, nsid, defName, shape, dependencies };
};

const struct: UnitShape = { kind: "struct", fields: [] };
const alias: UnitShape = {
  kind: "alias",
  type: { kind: "scalar", scalar: "text" },
};

const namesOf = (entries: Record<string, string>): NameTable =>
  new Map(
    Object.entries(entries).map(([id, name]) => [
      id,
      { name, fields: new Map<string, string>() },
    ])
  );

describe("Emission order", () => {
  it("should emit placeholders first, then dependencies before dependents", () => {
    const units = [
      unit("app.c#main", struct, ["app.a#main"]),
      unit("app.a#main", struct),
      unit("org.x#main", { kind: "placeholder" }),
      unit("app.d#main", struct, ["app.d#alias"]),
      unit("app.d#alias", alias, ["app.d#main"]),
    ];
    const names = namesOf({
      "app.a#main": "AppA",
      "app.c#main": "AppC",
      "app.d#main": "AppD",
      "app.d#alias": "AppBAlias",
      "org.x#main": "OrgX",
    });

    // The d cycle sorts by its smallest name and lists its struct first
    expect(orderUnits(units, names).map((u) => names.get(u.id)?.name)).to.deep.equal([
      "OrgX",
      "AppA",
      "AppD",
      "AppBAlias",
      "AppC",
    ]);
  });

  it("should not depend on input order", () => {
    const units = [
      unit("app.b#main", struct, ["app.a#main"]),
      unit("app.a#main", struct, ["app.b#main"]),
      unit("app.c#main", alias),
    ];
    const names = namesOf({
      "app.a#main": "AppA",
      "app.b#main": "AppB",
      "app.c#main": "AppC",
    });

    const forward = orderUnits(units, names).map((u) => u.id);
    const backward = orderUnits([...units].reverse(), names).map((u) => u.id);
    expect(forward).to.deep.equal(["app.a#main", "app.b#main", "app.c#main"]);
    expect(backward).to.deep.equal(forward);
  });

  it("should ignore dependencies on units that are not present", () => {
    const units = [unit("app.a#main", struct, ["app.gone#main"])];
    expect(orderUnits(units, namesOf({ "app.a#main": "AppA" })).map((u) => u.id)).to.deep.equal([
      "app.a#main",
    ]);
  });
});
