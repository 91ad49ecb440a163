import { describe, expect, it } from "vitest";
import { parseArgs } from "./cli";
import { InvalidInputError } from "./errors";

describe("parseArgs", () => {
  it("defaults to gen-z without a topic", () => {
    expect(parseArgs([])).toEqual({ register: "gen-z", save: false });
  });

  it("joins topic words up to the next flag", () => {
    expect(parseArgs(["--topic", "this", "is", "fine", "--register", "boomer", "--save"])).toEqual({
      topic: "this is fine",
      register: "boomer",
      save: true,
    });
  });

  it("rejects an unknown register", () => {
    expect(() => parseArgs(["--register", "gen-alpha"])).toThrow(InvalidInputError);
  });

  it("rejects a register flag without a value", () => {
    expect(() => parseArgs(["--topic", "drake", "--register"])).toThrow(InvalidInputError);
    expect(() => parseArgs(["--register", "--save"])).toThrow(InvalidInputError);
  });
});
