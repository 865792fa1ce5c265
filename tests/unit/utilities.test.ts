import { describe, it, expect } from "vitest";
import { NotationEvaluationError, UnknownUtilityError } from "../../src/errors.js";
import {
  UtilityRegistry,
  defaultUtilities,
  extractNumber,
  slugify,
} from "../../src/notation/utilities.js";
import type { Value } from "../../src/notation/values.js";

function run(name: string, value: Value, arg?: string, baseUrl?: string): Value {
  return defaultUtilities.apply([arg === undefined ? { name } : { name, arg }], value, baseUrl ? { baseUrl } : {});
}

describe("extractNumber", () => {
  it("pulls the first number out of text", () => {
    expect(extractNumber("£1,299.50")).toBe(1299.5);
    expect(extractNumber("12 reviews, 4 pages")).toBe(12);
    expect(extractNumber("-3.25 °C")).toBe(-3.25);
  });

  it("returns null when there is no number", () => {
    expect(extractNumber("none")).toBeNull();
    expect(extractNumber(null)).toBeNull();
    expect(extractNumber(true)).toBeNull();
  });
});

describe("slugify", () => {
  it("strips accents and joins words with dashes", () => {
    expect(slugify("  Crème Brûlée & Co.  ")).toBe("creme-brulee-co");
  });
});

describe("defaultUtilities", () => {
  it("transforms text", () => {
    expect(run("trim", "  x  ")).toBe("x");
    expect(run("uppercase", "abc")).toBe("ABC");
    expect(run("lowercase", "ABC")).toBe("abc");
    expect(run("slug", "Hello World")).toBe("hello-world");
  });

  it("maps scalar utilities over lists", () => {
    expect(run("trim", [" a ", [" b "]])).toEqual(["a", ["b"]]);
  });

  it("passes null through text utilities", () => {
    expect(run("trim", null)).toBeNull();
  });

  it("does arithmetic on extracted numbers", () => {
    expect(run("number", "£1,299.50")).toBe(1299.5);
    expect(run("int", "7.9 stars")).toBe(7);
    expect(run("add", "10 items", "5")).toBe(15);
    expect(run("subtract", 10, "2.5")).toBe(7.5);
    expect(run("multiply", "3", "4")).toBe(12);
    expect(run("divide", "9", "3")).toBe(3);
    expect(run("add", "no digits", "1")).toBe(1);
  });

  it("refuses division by zero and non-numeric arguments", () => {
    expect(() => run("divide", 1, "0")).toThrow('Utility "divide" cannot divide by zero');
    expect(() => run("add", 1, "x")).toThrow('Utility "add" expects a numeric argument, got "x"');
    expect(() => run("add", 1)).toThrow(NotationEvaluationError);
  });

  it("prepends and appends", () => {
    expect(run("prepend", "42", "#")).toBe("#42");
    expect(run("append", null, "px")).toBe("px");
    expect(() => run("prepend", "x")).toThrow('Utility "prepend" requires an argument');
  });

  it("replaces with search=>replacement", () => {
    expect(run("replace", "a-b-c", "-=>/")).toBe("a/b/c");
    expect(() => run("replace", "abc", "b")).toThrow(NotationEvaluationError);
  });

  it("cleans and resolves urls", () => {
    expect(run("clear_url_params", "https://shop.test/p?id=1&ref=2")).toBe("https://shop.test/p");
    expect(run("absolute_url", "../item/1", undefined, "https://shop.test/cat/list/")).toBe(
      "https://shop.test/cat/item/1",
    );
    expect(run("absolute_url", "not a url")).toBe("not a url");
  });

  it("substitutes defaults for null and empty values", () => {
    expect(run("default", null, "n/a")).toBe("n/a");
    expect(run("default", "", "n/a")).toBe("n/a");
    expect(run("default", "x", "n/a")).toBe("x");
    expect(run("default", null)).toBe("");
  });

  it("joins and splits", () => {
    expect(run("join", ["a", "b", null])).toBe("a,b,");
    expect(run("join", ["a", "b"], "/")).toBe("a/b");
    expect(run("split", "a, b ,c")).toEqual(["a", "b", "c"]);
    expect(run("split", "a|b", ";")).toEqual(["a|b"]);
  });

  it("picks the first and last entries", () => {
    expect(run("first", ["a", "b"])).toBe("a");
    expect(run("last", ["a", "b"])).toBe("b");
    expect(run("first", [])).toBeNull();
    expect(run("last", "solo")).toBe("solo");
  });
});

describe("UtilityRegistry", () => {
  it("applies a pipeline left to right", () => {
    expect(
      defaultUtilities.apply([{ name: "trim" }, { name: "number" }, { name: "multiply", arg: "2" }], " 21 ", {}),
    ).toBe(42);
  });

  it("throws UnknownUtilityError for unknown names", () => {
    expect(() => defaultUtilities.apply([{ name: "nope" }], "x", {})).toThrow(UnknownUtilityError);
    expect(() => defaultUtilities.apply([{ name: "nope" }], "x", {})).toThrow('Unknown utility "nope"');
  });

  it("accepts registered utilities without touching the defaults", () => {
    const registry = new UtilityRegistry();
    registry.register("double", (value) => (typeof value === "number" ? value * 2 : value));
    expect(registry.apply([{ name: "double" }], 4, {})).toBe(8);
    expect(registry.has("double")).toBe(true);
    expect(defaultUtilities.has("double")).toBe(false);
  });
});
