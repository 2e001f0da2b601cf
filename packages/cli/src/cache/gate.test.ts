import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { hashLexicons } from "@lexmodel/frontend";
import {
  createFixtureDir,
  lexicon,
  removeFixtureDir,
} from "@lexmodel/frontend/test-helpers";
import { runCachedGenerate } from "./gate.js";

const thing = lexicon("app.test.thing", {
  main: {
    type: "object",
    properties: { title: { type: "string" } },
  },
});

describe("runCachedGenerate", () => {
  const dirs: string[] = [];
  const fixture = (files: Record<string, unknown>): string => {
    const dir = createFixtureDir(files);
    dirs.push(dir);
    return dir;
  };

  afterEach(() => {
    dirs.splice(0).forEach(removeFixtureDir);
  });

  const digestOf = (inputDir: string, prefix?: string): string => {
    const digest = hashLexicons(inputDir, prefix);
    if (!digest.ok) throw new Error(digest.error.message);
    return digest.value;
  };

  it("should generate and store the output on a miss", () => {
    const input = fixture({ "thing.json": thing });
    const work = fixture({});
    const cacheRoot = join(work, "cache");
    const outputDir = join(work, "out");

    const result = runCachedGenerate({ inputDir: input, outputDir, cacheRoot, useCache: true });
    if (!result.ok) {
      expect.fail(result.error.message);
      return;
    }

    const digest = digestOf(input);
    expect(result.value).to.deep.equal({
      status: "miss",
      digest,
      slot: join(cacheRoot, digest),
      files: [join(outputDir, "models.py")],
    });
    expect(readdirSync(cacheRoot)).to.deep.equal([digest]);
    expect(readFileSync(join(cacheRoot, digest, "models.py"), "utf-8")).to.equal(
      readFileSync(join(outputDir, "models.py"), "utf-8")
    );
  });

  it("should copy the stored slot on a hit without compiling", () => {
    const input = fixture({ "thing.json": thing });
    const work = fixture({});
    const cacheRoot = join(work, "cache");
    const slot = join(cacheRoot, digestOf(input));
    mkdirSync(slot, { recursive: true });
    writeFileSync(join(slot, "models.py"), "# cached\n");
    const outputDir = join(work, "out");

    const result = runCachedGenerate({ inputDir: input, outputDir, cacheRoot, useCache: true });
    if (!result.ok) {
      expect.fail(result.error.message);
      return;
    }

    expect(result.value.status).to.equal("hit");
    expect(result.value.files).to.deep.equal([join(outputDir, "models.py")]);
    expect(readFileSync(join(outputDir, "models.py"), "utf-8")).to.equal("# cached\n");
  });

  it("should regenerate but keep the existing slot when the lookup is skipped", () => {
    const input = fixture({ "thing.json": thing });
    const work = fixture({});
    const cacheRoot = join(work, "cache");
    const slot = join(cacheRoot, digestOf(input));
    mkdirSync(slot, { recursive: true });
    writeFileSync(join(slot, "models.py"), "# cached\n");
    const outputDir = join(work, "out");

    const result = runCachedGenerate({ inputDir: input, outputDir, cacheRoot, useCache: false });
    if (!result.ok) {
      expect.fail(result.error.message);
      return;
    }

    expect(result.value.status).to.equal("miss");
    expect(readFileSync(join(outputDir, "models.py"), "utf-8")).to.include(
      "class AppTestThing(BaseModel):"
    );
    expect(readFileSync(join(slot, "models.py"), "utf-8")).to.equal("# cached\n");
    expect(readdirSync(cacheRoot)).to.deep.equal([digestOf(input)]);
  });

  it("should key the slot by prefix", () => {
    const input = fixture({ "thing.json": thing });
    const work = fixture({});
    const cacheRoot = join(work, "cache");

    const all = runCachedGenerate({
      inputDir: input,
      outputDir: join(work, "all"),
      cacheRoot,
      useCache: true,
    });
    const none = runCachedGenerate({
      inputDir: input,
      outputDir: join(work, "none"),
      prefix: "org.none",
      cacheRoot,
      useCache: true,
    });

    expect(all.ok && none.ok).to.equal(true);
    if (!all.ok || !none.ok) return;
    expect(none.value.digest).to.not.equal(all.value.digest);
    expect(none.value.files).to.deep.equal([]);
    expect(existsSync(join(work, "none"))).to.equal(false);
    expect(readdirSync(none.value.slot)).to.deep.equal([]);
  });

  it("should not store anything when generation fails", () => {
    const input = fixture({ "bad.json": "{" });
    const work = fixture({});
    const cacheRoot = join(work, "cache");

    const result = runCachedGenerate({
      inputDir: input,
      outputDir: join(work, "out"),
      cacheRoot,
      useCache: true,
    });
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.code).to.equal("LEX1002");
    expect(existsSync(cacheRoot)).to.equal(false);
  });
});
