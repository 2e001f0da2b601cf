/**
 * Tests for reference parsing and collection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  collectReferences,
  parseReference,
  resolveReference,
} from "./references.js";
import { buildSymbolTable } from "../symbol-table/creation.js";
import type { LexiconDocument } from "../lexicon/types.js";

const document = (
  nsid: string,
  defs: LexiconDocument["defs"]
): LexiconDocument => ({
  nsid,
  defs,
  filePath: `${nsid}.json`,
  origin: "input",
});

describe("References", () => {
  describe("parseReference", () => {
    it("should resolve a local ref against the referring document", () => {
      expect(parseReference("#view", "app.test.thing")).to.deep.equal({
        nsid: "app.test.thing",
        name: "view",
      });
    });

    it("should parse a qualified ref", () => {
      expect(parseReference("app.test.other#view", "app.test.thing")).to.deep.equal({
        nsid: "app.test.other",
        name: "view",
      });
    });

    it("should treat a bare nsid as its main def", () => {
      expect(parseReference("app.test.other", "app.test.thing")).to.deep.equal({
        nsid: "app.test.other",
        name: "main",
      });
    });

    it("should reject empty and multi-hash refs", () => {
      expect(parseReference("", "app.test.thing")).to.equal(undefined);
      expect(parseReference("#", "app.test.thing")).to.equal(undefined);
      expect(parseReference("app.test.other#", "app.test.thing")).to.equal(undefined);
      expect(parseReference("a#b#c", "app.test.thing")).to.equal(undefined);
    });
  });

  describe("collectReferences", () => {
    it("should collect refs from a record with their JSON paths", () => {
      const sites = collectReferences(
        {
          kind: "record",
          record: {
            kind: "object",
            properties: [
              { name: "subject", type: { kind: "ref", ref: "#view" } },
              { name: "title", type: { kind: "string" } },
              {
                name: "embeds",
                type: {
                  kind: "array",
                  items: { kind: "union", refs: ["#a", "app.test.b"], closed: false },
                },
              },
            ],
            required: [],
            nullable: [],
          },
        },
        "defs.main"
      );

      expect(sites).to.deep.equal([
        { ref: "#view", path: "defs.main.record.properties.subject" },
        { ref: "#a", path: "defs.main.record.properties.embeds.items.refs.0" },
        { ref: "app.test.b", path: "defs.main.record.properties.embeds.items.refs.1" },
      ]);
    });

    it("should collect refs from procedure bodies", () => {
      const sites = collectReferences(
        {
          kind: "procedure",
          input: { encoding: "application/json", schema: { kind: "ref", ref: "#in" } },
          output: {
            encoding: "application/json",
            schema: {
              kind: "object",
              properties: [{ name: "result", type: { kind: "ref", ref: "#out" } }],
              required: [],
              nullable: [],
            },
          },
          errors: [],
        },
        "defs.main"
      );

      expect(sites).to.deep.equal([
        { ref: "#in", path: "defs.main.input.schema" },
        { ref: "#out", path: "defs.main.output.schema.properties.result" },
      ]);
    });

    it("should find nothing in a token", () => {
      expect(collectReferences({ kind: "token" }, "defs.flag")).to.deep.equal([]);
    });
  });

  describe("resolveReference", () => {
    const table = buildSymbolTable([
      document("app.test.thing", [
        { name: "main", definition: { kind: "token" } },
        {
          name: "view",
          definition: { kind: "object", properties: [], required: [], nullable: [] },
        },
      ]),
      document("app.test.getThing", [
        { name: "main", definition: { kind: "query", errors: [] } },
      ]),
    ]);
    const from = { nsid: "app.test.thing", name: "main" };

    it("should resolve an existing def", () => {
      const result = resolveReference(table, from, { ref: "#view", path: "defs.main" });
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.id).to.equal("app.test.thing#view");
      }
    });

    it("should report a missing def in a loaded document", () => {
      const result = resolveReference(table, from, {
        ref: "#missing",
        path: "defs.main.record.properties.x",
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("LEX2001");
        expect(result.error.ref).to.equal("#missing");
        expect(result.error.message).to.equal(
          "Reference '#missing' does not resolve: 'app.test.thing' has no definition 'missing'"
        );
        expect(result.error.location).to.deep.equal({
          nsid: "app.test.thing",
          def: "main",
          path: "defs.main.record.properties.x",
        });
      }
    });

    it("should report a document that is not loaded", () => {
      const result = resolveReference(table, from, {
        ref: "app.other.thing",
        path: "defs.main",
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "Reference 'app.other.thing' does not resolve: lexicon 'app.other.thing' is not loaded"
        );
      }
    });

    it("should reject a ref to an endpoint", () => {
      const result = resolveReference(table, from, {
        ref: "app.test.getThing",
        path: "defs.main",
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("LEX2002");
        expect(result.error.kind).to.equal("UnsupportedKind");
      }
    });

    it("should report a malformed ref with a hint", () => {
      const result = resolveReference(table, from, { ref: "#", path: "defs.main" });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("LEX2001");
        expect(result.error.message).to.equal("Malformed reference '#'");
        expect(result.error.hint).to.equal("Use '#name', 'nsid' or 'nsid#name'");
      }
    });
  });
});
