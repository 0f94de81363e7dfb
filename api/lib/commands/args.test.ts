import { describe, it, expect } from "vitest";
import { ArgumentSyntaxError, splitArgs } from "./args.js";

describe("splitArgs", () => {
  it("should split on whitespace", () => {
    expect(splitArgs("user1  user2\tuser3")).toEqual(["user1", "user2", "user3"]);
  });

  it("should group double-quoted words", () => {
    expect(splitArgs('"needs review" bug')).toEqual(["needs review", "bug"]);
  });

  it("should treat single-quoted text literally", () => {
    expect(splitArgs("'Release \\1.2' octocat")).toEqual(["Release \\1.2", "octocat"]);
  });

  it("should honour escapes inside double quotes only for quote and backslash", () => {
    expect(splitArgs('"say \\"hi\\" \\n"')).toEqual(['say "hi" \\n']);
  });

  it("should escape the next character outside quotes", () => {
    expect(splitArgs("a\\ b c")).toEqual(["a b", "c"]);
  });

  it("should join adjacent quoted and plain parts into one word", () => {
    expect(splitArgs("release-'1.2'\"-rc\"")).toEqual(["release-1.2-rc"]);
  });

  it("should keep an empty quoted word", () => {
    expect(splitArgs('a "" b')).toEqual(["a", "", "b"]);
  });

  it("should not expand shell syntax", () => {
    expect(splitArgs("$HOME *.ts `id`")).toEqual(["$HOME", "*.ts", "`id`"]);
  });

  it("should return no words for blank input", () => {
    expect(splitArgs("   ")).toEqual([]);
  });

  it("should reject unterminated quotes", () => {
    expect(() => splitArgs('"open')).toThrow(new ArgumentSyntaxError("unterminated double quote"));
    expect(() => splitArgs("'open")).toThrow(new ArgumentSyntaxError("unterminated single quote"));
  });

  it("should reject a trailing backslash", () => {
    expect(() => splitArgs("abc\\")).toThrow(ArgumentSyntaxError);
  });
});
