/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse generate command", () => {
        const result = parseArgs(["generate"]);
        expect(result.command).to.equal("generate");
        expect(result.errors).to.deep.equal([]);
      });

      it("should parse hash command", () => {
        expect(parseArgs(["hash"]).command).to.equal("hash");
      });

      it("should parse help command from --help and -h", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
        expect(parseArgs(["generate", "-h"]).command).to.equal("help");
      });

      it("should parse version command from --version and -v", () => {
        expect(parseArgs(["--version"]).command).to.equal("version");
        expect(parseArgs(["-v"]).command).to.equal("version");
      });

      it("should leave the command empty without arguments", () => {
        expect(parseArgs([]).command).to.equal("");
      });
    });

    describe("Lexicon Directory", () => {
      it("should parse the directory after the command", () => {
        const result = parseArgs(["generate", "./lexicons"]);
        expect(result.lexiconDir).to.equal("./lexicons");
      });

      it("should handle no directory", () => {
        expect(parseArgs(["generate"]).lexiconDir).to.be.undefined;
      });

      it("should accept the directory after options", () => {
        const result = parseArgs(["generate", "-p", "app.test", "lex"]);
        expect(result.lexiconDir).to.equal("lex");
        expect(result.options.prefix).to.equal("app.test");
      });

      it("should reject a second positional argument", () => {
        const result = parseArgs(["generate", "a", "b"]);
        expect(result.lexiconDir).to.equal("a");
        expect(result.errors).to.deep.equal(["Unexpected argument 'b'"]);
      });
    });

    describe("Options", () => {
      it("should parse --verbose and -V", () => {
        expect(parseArgs(["generate", "--verbose"]).options.verbose).to.be.true;
        expect(parseArgs(["generate", "-V"]).options.verbose).to.be.true;
      });

      it("should parse --quiet and -q", () => {
        expect(parseArgs(["generate", "--quiet"]).options.quiet).to.be.true;
        expect(parseArgs(["generate", "-q"]).options.quiet).to.be.true;
      });

      it("should parse options with values", () => {
        const result = parseArgs([
          "generate",
          "-o",
          "out",
          "--prefix",
          "fm.plyr",
          "-c",
          "custom.json",
          "--cache-dir",
          "/tmp/cache",
        ]);
        expect(result.options).to.deep.equal({
          out: "out",
          prefix: "fm.plyr",
          config: "custom.json",
          cacheDir: "/tmp/cache",
        });
        expect(result.errors).to.deep.equal([]);
      });

      it("should parse --no-cache", () => {
        expect(parseArgs(["generate", "--no-cache"]).options.noCache).to.be.true;
      });

      it("should report an option missing its value", () => {
        const result = parseArgs(["generate", "-o"]);
        expect(result.options.out).to.be.undefined;
        expect(result.errors).to.deep.equal(["Option '-o' requires a value"]);
      });

      it("should not take the next option as a value", () => {
        const result = parseArgs(["generate", "-p", "-q"]);
        expect(result.options).to.deep.equal({ quiet: true });
        expect(result.errors).to.deep.equal(["Option '-p' requires a value"]);
      });

      it("should report unknown options", () => {
        expect(parseArgs(["generate", "--fast"]).errors).to.deep.equal([
          "Unknown option '--fast'",
        ]);
      });
    });
  });
});
