import { describe, it, expect } from "vitest";
import { Command, InvalidArgumentError } from "commander";
import { getErrorMessage, getGlobalOptions, parseEntryIndex } from "./helpers.js";

describe("parseEntryIndex", () => {
  it("parses non-negative integers", () => {
    expect(parseEntryIndex("0")).toBe(0);
    expect(parseEntryIndex("12")).toBe(12);
  });

  it.each(["-1", "1.5", "abc", "NaN"])("rejects %s", (value) => {
    expect(() => parseEntryIndex(value)).toThrow(InvalidArgumentError);
  });
});

describe("getGlobalOptions", () => {
  function parseWith(args: string[]): Command {
    let seen: Command | undefined;
    const program = new Command("flowport")
      .exitOverride()
      .option("-v, --verbose", "increase verbosity", (_: string, prev: number) => prev + 1, 0)
      .option("-d, --dir <path>", "project root");
    program.addCommand(
      new Command("noop").action((_opts: unknown, command: Command) => {
        seen = command;
      })
    );
    program.parse(["node", "flowport", ...args]);
    if (!seen) throw new Error("subcommand did not run");
    return seen;
  }

  it("reads inherited options from a subcommand", () => {
    expect(getGlobalOptions(parseWith(["-vv", "--dir", "/work", "noop"]))).toEqual({
      verbose: 2,
      dir: "/work",
    });
  });

  it("defaults verbosity to zero", () => {
    expect(getGlobalOptions(parseWith(["noop"]))).toEqual({ verbose: 0, dir: undefined });
  });
});

describe("getErrorMessage", () => {
  it("uses the message of an Error", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("falls back for non-errors", () => {
    expect(getErrorMessage("boom")).toBe("Unknown error");
  });
});
