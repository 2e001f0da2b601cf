/**
 * Tests for lexicon resolution
 */

import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import { resolveLexicons } from "./resolution.js";
import type { Resolution } from "./types.js";
import { loadLexicons } from "../loader.js";
import { loadBuiltinLexicons } from "../builtin.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import {
  createFixtureDir,
  lexicon,
  removeFixtureDir,
} from "../test-helpers.js";

const object = (properties: Record<string, unknown>) => ({
  type: "object",
  properties,
});

describe("Lexicon Resolution", () => {
  let dir = "";

  afterEach(() => {
    if (dir) removeFixtureDir(dir);
    dir = "";
  });

  const resolve = (
    files: Record<string, unknown>,
    prefix?: string
  ): Result<Resolution, Diagnostic> => {
    dir = createFixtureDir(files);
    const lexicons = loadLexicons(dir);
    if (!lexicons.ok) return lexicons;
    const builtins = loadBuiltinLexicons();
    if (!builtins.ok) return builtins;
    return resolveLexicons(lexicons.value, { prefix, builtins: builtins.value });
  };

  it("should resolve local, qualified and bare refs", () => {
    const result = resolve({
      "thing.json": lexicon("app.test.thing", {
        main: object({
          view: { type: "ref", ref: "#view" },
          other: { type: "ref", ref: "app.test.other" },
          detail: { type: "ref", ref: "app.test.other#detail" },
        }),
        view: object({}),
      }),
      "other.json": lexicon("app.test.other", {
        main: object({}),
        detail: object({}),
      }),
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.references.get("app.test.thing#main")).to.deep.equal([
      "app.test.other#detail",
      "app.test.other#main",
      "app.test.thing#view",
    ]);
    expect([...result.value.generated].sort()).to.deep.equal([
      "app.test.other#detail",
      "app.test.other#main",
      "app.test.thing#main",
      "app.test.thing#view",
    ]);
    expect(result.value.cycles).to.deep.equal([]);
    expect(result.value.opaque.size).to.equal(0);
  });

  it("should fail on the first unresolved ref", () => {
    const result = resolve({
      "thing.json": lexicon("app.test.thing", {
        main: object({ missing: { type: "ref", ref: "#nope" } }),
      }),
    });

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.kind).to.equal("UnresolvedReference");
      expect(result.error.location?.path).to.equal(
        "defs.main.properties.missing"
      );
    }
  });

  it("should record a two-document cycle", () => {
    const result = resolve({
      "a.json": lexicon("app.a", {
        main: object({ b: { type: "ref", ref: "app.b" } }),
      }),
      "b.json": lexicon("app.b", {
        main: object({ a: { type: "ref", ref: "app.a" } }),
      }),
    });

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.cycles).to.deep.equal([["app.a#main", "app.b#main"]]);
    }
  });

  it("should record a self reference as a cycle", () => {
    const result = resolve({
      "node.json": lexicon("app.test.node", {
        main: object({
          children: { type: "array", items: { type: "ref", ref: "#main" } },
        }),
      }),
    });

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.cycles).to.deep.equal([["app.test.node#main"]]);
    }
  });

  describe("prefix filter", () => {
    const files = {
      "thing.json": lexicon("app.test.thing", {
        main: object({ ext: { type: "ref", ref: "org.other.ext" } }),
      }),
      "ext.json": lexicon("org.other.ext", {
        main: object({}),
        unused: object({}),
      }),
      "testing.json": lexicon("app.testing.thing", { main: object({}) }),
    };

    it("should generate only selected documents and mark others opaque", () => {
      const result = resolve(files, "app.test");
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect([...result.value.generated]).to.deep.equal(["app.test.thing#main"]);
      expect([...result.value.opaque]).to.deep.equal(["org.other.ext#main"]);
      expect(result.value.documents.map((d) => d.document.nsid)).to.deep.equal([
        "app.test.thing",
      ]);
    });

    it("should match whole segments only", () => {
      const result = resolve(files, "app.tes");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.generated.size).to.equal(0);
        expect(result.value.documents).to.deep.equal([]);
      }
    });

    it("should still fail on unresolved refs outside the prefix target", () => {
      const result = resolve(
        {
          "thing.json": lexicon("app.test.thing", {
            main: object({ gone: { type: "ref", ref: "org.other.gone" } }),
          }),
        },
        "app.test"
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("LEX2001");
      }
    });

    it("should not validate documents outside the prefix", () => {
      const result = resolve(
        {
          "thing.json": lexicon("app.test.thing", { main: object({}) }),
          "broken.json": lexicon("org.other.broken", {
            main: object({ gone: { type: "ref", ref: "#gone" } }),
          }),
        },
        "app.test"
      );
      expect(result.ok).to.equal(true);
    });
  });

  describe("bundled lexicons", () => {
    it("should generate only the bundled defs that are reached", () => {
      const result = resolve({
        "post.json": lexicon("app.test.post", {
          main: object({
            labels: { type: "ref", ref: "com.atproto.label.defs#selfLabels" },
            subject: { type: "ref", ref: "com.atproto.repo.strongRef" },
          }),
        }),
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(
        result.value.documents.map((d) => [
          d.document.nsid,
          d.defs.map((def) => def.name),
        ])
      ).to.deep.equal([
        ["app.test.post", ["main"]],
        ["com.atproto.label.defs", ["selfLabels", "selfLabel"]],
        ["com.atproto.repo.strongRef", ["main"]],
      ]);
    });

    it("should reach bundled defs across documents and endpoint lexicons", () => {
      const result = resolve({
        "feed.json": lexicon("app.test.feed", {
          main: object({
            commit: { type: "ref", ref: "com.atproto.sync.subscribeRepos#commit" },
            account: { type: "ref", ref: "com.atproto.admin.defs#accountView" },
          }),
        }),
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(
        result.value.documents.map((d) => [
          d.document.nsid,
          d.defs.map((def) => def.name),
        ])
      ).to.deep.equal([
        ["app.test.feed", ["main"]],
        ["com.atproto.admin.defs", ["accountView", "threatSignature"]],
        ["com.atproto.server.defs", ["inviteCode", "inviteCodeUse"]],
        ["com.atproto.sync.subscribeRepos", ["commit", "repoOp"]],
      ]);
    });

    it("should let an input document shadow a bundled one", () => {
      const result = resolve({
        "strongRef.json": lexicon("com.atproto.repo.strongRef", {
          main: object({ uri: { type: "string" } }),
          extra: object({}),
        }),
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const strongRef = result.value.table.documents.get(
        "com.atproto.repo.strongRef"
      );
      expect(strongRef?.origin).to.equal("input");
      expect(result.value.generated.has("com.atproto.repo.strongRef#extra")).to.equal(
        true
      );
    });

    it("should not generate unreferenced bundled defs", () => {
      const result = resolve({
        "thing.json": lexicon("app.test.thing", { main: { type: "token" } }),
      });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect([...result.value.generated]).to.deep.equal(["app.test.thing#main"]);
      }
    });
  });
});
