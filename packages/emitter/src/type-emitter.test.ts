import { describe, it } from "mocha";
import { expect } from "chai";
import type { GeneratedUnit, NameTable, ResolvedType } from "./types.js";
import {
  createImportSet,
  emitType,
  liftConstraints,
  pythonValue,
  quoteAnnotation,
  type TypeEmitContext,
} from "./type-emitter.js";

const tagged = (id: string, name: string): [GeneratedUnit, string] => [
  {
    id,
    nsid: id.split("#")[0] ?? id,
    defName: id.split("#")[1] ?? "main",
    shape: { kind: "struct", fields: [] },
    dependencies: [],
    discriminator: id,
  },
  name,
];

const createContext = (
  entries: readonly [GeneratedUnit, string][] = [],
  pending: readonly string[] = []
): TypeEmitContext => {
  const names: NameTable = new Map(
    entries.map(([unit, name]) => [
      unit.id,
      { name, fields: new Map<string, string>() },
    ])
  );
  return {
    names,
    units: new Map(entries.map(([unit]) => [unit.id, unit])),
    pending: new Set(pending),
    imports: createImportSet(),
  };
};

const image = tagged("app.test.embed#image", "AppTestEmbedImage");
const video = tagged("app.test.embed#video", "AppTestEmbedVideo");

const union = (closed: boolean, ...units: readonly string[]): ResolvedType => ({
  kind: "union",
  variants: units.map((unit) => ({ kind: "named", unit })),
  closed,
  discriminator: "$type",
});

describe("Type emitter", () => {
  it("should map scalars to Python types", () => {
    const context = createContext();
    const render = (type: ResolvedType): string => emitType(type, context).text;

    expect(render({ kind: "scalar", scalar: "text" })).to.equal("str");
    expect(render({ kind: "scalar", scalar: "integer" })).to.equal("int");
    expect(render({ kind: "scalar", scalar: "boolean" })).to.equal("bool");
    expect(render({ kind: "scalar", scalar: "bytes" })).to.equal("bytes");
    expect(render({ kind: "scalar", scalar: "link" })).to.equal("str");
    expect(render({ kind: "scalar", scalar: "blob" })).to.equal("dict[str, Any]");
    expect(render({ kind: "scalar", scalar: "unknown" })).to.equal("Any");
    expect([...context.imports.typing]).to.deep.equal(["Any"]);
  });

  it("should render nested bounds inline", () => {
    const context = createContext();
    const type: ResolvedType = {
      kind: "list",
      inner: { kind: "scalar", scalar: "text", constraints: { maxLength: 64 } },
      constraints: { maxLength: 10 },
    };

    expect(emitType(type, context).text).to.equal(
      "Annotated[list[Annotated[str, Field(max_length=64)]], Field(max_length=10)]"
    );
    expect([...context.imports.typing]).to.deep.equal(["Annotated"]);
    expect([...context.imports.pydantic]).to.deep.equal(["Field"]);
  });

  it("should not render grapheme bounds", () => {
    const type: ResolvedType = {
      kind: "scalar",
      scalar: "text",
      constraints: { maxGraphemes: 300 },
    };
    expect(emitType(type, createContext()).text).to.equal("str");
  });

  it("should render enums as literals", () => {
    const type: ResolvedType = { kind: "enum", variants: ["a", 2, false] };
    expect(emitType(type, createContext()).text).to.equal('Literal["a", 2, False]');
  });

  it("should render a closed union of tagged structs as discriminated", () => {
    const context = createContext([image, video]);
    expect(
      emitType(union(true, image[0].id, video[0].id), context).text
    ).to.equal(
      'Annotated[AppTestEmbedImage | AppTestEmbedVideo, Field(discriminator="type_")]'
    );
  });

  it("should let open unions accept any object", () => {
    const context = createContext([image, video]);
    expect(
      emitType(union(false, image[0].id, video[0].id), context).text
    ).to.equal("AppTestEmbedImage | AppTestEmbedVideo | dict[str, Any]");
  });

  it("should not discriminate a closed union with one variant", () => {
    const context = createContext([image]);
    expect(emitType(union(true, image[0].id), context).text).to.equal(
      "AppTestEmbedImage"
    );
  });

  it("should flag references to units not declared yet", () => {
    const context = createContext([image], [image[0].id]);
    const emitted = emitType(
      { kind: "optional", inner: { kind: "named", unit: image[0].id } },
      context
    );
    expect(emitted).to.deep.equal({
      text: "AppTestEmbedImage | None",
      forward: true,
    });
  });

  it("should lift the outermost bounds through optional", () => {
    const lifted = liftConstraints({
      kind: "optional",
      inner: { kind: "scalar", scalar: "integer", constraints: { minimum: 0 } },
    });
    expect(lifted).to.deep.equal({
      type: { kind: "optional", inner: { kind: "scalar", scalar: "integer" } },
      constraints: { minimum: 0 },
    });
  });

  it("should quote annotations", () => {
    expect(quoteAnnotation('Literal["it\'s"]')).to.equal("'Literal[\"it\\'s\"]'");
  });

  it("should render Python literals", () => {
    expect(pythonValue(true)).to.equal("True");
    expect(pythonValue(7)).to.equal("7");
    expect(pythonValue('say "hi"')).to.equal('"say \\"hi\\""');
  });
});
