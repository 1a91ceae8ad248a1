import { describe, it, expect } from "vitest";
import { tokenizeCommand } from "./tokenize-command";
import { ConfigError } from "./config-error";

describe("tokenizeCommand", () => {
  it("splits on whitespace", () => {
    expect(tokenizeCommand("im-sepia -a 80")).toEqual(["im-sepia", "-a", "80"]);
  });

  it("ignores leading, trailing and repeated whitespace", () => {
    expect(tokenizeCommand("  im-blur   -r 2\t-s  ")).toEqual([
      "im-blur",
      "-r",
      "2",
      "-s",
    ]);
  });

  it("keeps a double-quoted color spec as one token", () => {
    expect(tokenizeCommand(`im-colorfx -c "rgb(255, 0, 0)"`)).toEqual([
      "im-colorfx",
      "-c",
      "rgb(255, 0, 0)",
    ]);
  });

  it("keeps double quotes literal inside single quotes", () => {
    expect(tokenizeCommand(`im-caption -t 'say "hi"'`)).toEqual([
      "im-caption",
      "-t",
      'say "hi"',
    ]);
  });

  it("joins quoted and unquoted parts of the same word", () => {
    expect(tokenizeCommand(`im-tint -c rgb"(1, 2, 3)"`)).toEqual([
      "im-tint",
      "-c",
      "rgb(1, 2, 3)",
    ]);
  });

  it("escapes a space with a backslash", () => {
    expect(tokenizeCommand("my\\ script -x")).toEqual(["my script", "-x"]);
  });

  it("only escapes quote and backslash inside double quotes", () => {
    expect(tokenizeCommand('cmd "a\\b" "say \\"hi\\""')).toEqual([
      "cmd",
      "a\\b",
      'say "hi"',
    ]);
  });

  it("produces an empty token for empty quotes", () => {
    expect(tokenizeCommand('cmd "" x')).toEqual(["cmd", "", "x"]);
  });

  it("keeps a trailing backslash", () => {
    expect(tokenizeCommand("cmd x\\")).toEqual(["cmd", "x\\"]);
  });

  it("returns no tokens for blank input", () => {
    expect(tokenizeCommand("   ")).toEqual([]);
  });

  it("rejects an unterminated double quote", () => {
    expect(() => tokenizeCommand('im-colorfx -c "rgb(1, 2')).toThrow(ConfigError);
    expect(() => tokenizeCommand('im-colorfx -c "rgb(1, 2')).toThrow(
      /Unterminated double quote/,
    );
  });

  it("rejects an unterminated single quote", () => {
    expect(() => tokenizeCommand("im-caption -t 'hello")).toThrow(
      /Unterminated single quote/,
    );
  });
});
