import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { DIGEST_LENGTH, hashLexicons } from "./hash.js";
import {
  createFixtureDir,
  lexicon,
  removeFixtureDir,
} from "./test-helpers.js";

const files = {
  "app/test/thing.json": lexicon("app.test.thing", {
    main: { type: "object", properties: { name: { type: "string" } } },
  }),
  "app/test/other.json": lexicon("app.test.other", {
    main: { type: "token" },
  }),
};

const hashOf = (dir: string, prefix?: string, version = "1.0.0"): string => {
  const result = hashLexicons(dir, prefix, { version });
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
};

describe("hashLexicons", () => {
  const dirs: string[] = [];
  const fixture = (): string => {
    const dir = createFixtureDir(files);
    dirs.push(dir);
    return dir;
  };

  afterEach(() => {
    dirs.splice(0).forEach(removeFixtureDir);
  });

  it("should return 16 lowercase hex characters", () => {
    const digest = hashOf(fixture());
    expect(digest).to.have.length(DIGEST_LENGTH);
    expect(digest).to.match(/^[0-9a-f]{16}$/);
  });

  it("should give identical directories the same digest", () => {
    expect(hashOf(fixture())).to.equal(hashOf(fixture()));
  });

  it("should change when one byte is appended to a file", () => {
    const dir = fixture();
    const before = hashOf(dir);
    fs.appendFileSync(path.join(dir, "app/test/thing.json"), " ");
    expect(hashOf(dir)).to.not.equal(before);
  });

  it("should change when a file is renamed", () => {
    const dir = fixture();
    const before = hashOf(dir);
    fs.renameSync(
      path.join(dir, "app/test/other.json"),
      path.join(dir, "app/test/renamed.json")
    );
    expect(hashOf(dir)).to.not.equal(before);
  });

  it("should ignore files that are not json", () => {
    const dir = fixture();
    const before = hashOf(dir);
    fs.writeFileSync(path.join(dir, "notes.txt"), "scratch");
    expect(hashOf(dir)).to.equal(before);
  });

  it("should mix in the prefix", () => {
    const dir = fixture();
    const none = hashOf(dir);
    const app = hashOf(dir, "app");
    const appTest = hashOf(dir, "app.test");
    expect(new Set([none, app, appTest]).size).to.equal(3);
  });

  it("should mix in the compiler version", () => {
    const dir = fixture();
    expect(hashOf(dir, undefined, "1.0.0")).to.not.equal(
      hashOf(dir, undefined, "1.0.1")
    );
  });

  it("should fail on a missing directory", () => {
    const result = hashLexicons(path.join(fixture(), "missing"));
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.code).to.equal("LEX1001");
    }
  });
});
