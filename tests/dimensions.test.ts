import { beforeEach, describe, expect, it } from "vitest";
import { parseDimension, parseViewBox, resolveDimensions } from "../scripts/svg/dimensions.js";
import { resetRunLog, warningsFor } from "../scripts/utils/build-log.js";
import { catchError } from "./helpers.js";

beforeEach(() => {
  resetRunLog();
});

describe("parseDimension", () => {
  it.each([
    ["24", 24],
    [" 16 ", 16],
    ["24px", 24],
    ["2rem", 2],
    ["3em", 3],
    ["12pt", 12],
    ["24.0px", 24],
  ])("parses %s", (value, expected) => {
    expect(parseDimension(value)).toBe(expected);
  });

  it.each(["0", "50%", "24.5px", "-5px", "px", "auto", "1e2"])("treats %s as absent", (value) => {
    expect(parseDimension(value)).toBeUndefined();
  });
});

describe("parseViewBox", () => {
  it("parses four numbers", () => {
    expect(parseViewBox("0 0 24 24")).toEqual({ minX: 0, minY: 0, width: 24, height: 24 });
    expect(parseViewBox("  -2   1.5\t20 18 ")).toEqual({ minX: -2, minY: 1.5, width: 20, height: 18 });
  });

  it("rounds width and height", () => {
    expect(parseViewBox("0 0 23.6 11.2")).toEqual({ minX: 0, minY: 0, width: 24, height: 11 });
  });

  it("rejects the wrong field count", () => {
    expect(() => parseViewBox("0 0 24")).toThrow("Invalid viewBox format: expected 4 numbers, got 3");
  });

  it("rejects non-numeric fields", () => {
    expect(() => parseViewBox("0 0 wide 24")).toThrow("Invalid viewBox width: 'wide'");
  });
});

describe("resolveDimensions: local policy", () => {
  const local = (width?: string, height?: string, viewBox?: string) =>
    resolveDimensions({ kind: "local", attributes: { width, height, viewBox }, source: "icon.svg" });

  it("uses width, height and viewBox as-is", () => {
    expect(local("16", "16", "0 0 24 24")).toEqual({ width: 16, height: 16, viewBox: "0 0 24 24" });
  });

  it("derives the viewBox from width and height", () => {
    expect(local("32", "16")).toEqual({ width: 32, height: 16, viewBox: "0 0 32 16" });
  });

  it("derives width and height from the viewBox", () => {
    expect(local(undefined, undefined, "0 0 48 32")).toEqual({ width: 48, height: 32, viewBox: "0 0 48 32" });
  });

  it("makes a width-only icon square", () => {
    expect(local("20")).toEqual({ width: 20, height: 20, viewBox: "0 0 20 20" });
  });

  it("makes a height-only icon square", () => {
    expect(local(undefined, "18")).toEqual({ width: 18, height: 18, viewBox: "0 0 18 18" });
  });

  it("takes the missing height from the viewBox", () => {
    expect(local("20", undefined, "0 0 24 12")).toEqual({ width: 20, height: 12, viewBox: "0 0 24 12" });
  });

  it("takes the missing width from the viewBox", () => {
    expect(local(undefined, "10", "0 0 24 12")).toEqual({ width: 24, height: 10, viewBox: "0 0 24 12" });
  });

  it("falls back to 24x24 with a warning", () => {
    expect(local()).toEqual({ width: 24, height: 24, viewBox: "0 0 24 24" });
    expect(warningsFor("parse")).toEqual(["No dimensions found in icon.svg, using default 24x24"]);
  });

  it("treats unusable dimensions as absent", () => {
    expect(local("100%", "100%", "0 0 24 24")).toEqual({ width: 24, height: 24, viewBox: "0 0 24 24" });
  });

  it("rejects a viewBox side that is not positive", () => {
    expect(catchError(() => local(undefined, undefined, "0 0 0 24"))).toMatchObject({
      kind: "MalformedSource",
      message: "viewBox width must be positive, got '0 0 0 24'",
    });
  });

  it("rejects a malformed viewBox it needs", () => {
    expect(catchError(() => local("24", undefined, "0 0 24"))).toMatchObject({ kind: "MalformedSource" });
  });

  it("does not warn when dimensions are present", () => {
    local("24", "24");
    expect(warningsFor("parse")).toEqual([]);
  });
});

describe("resolveDimensions: registry policy", () => {
  it("defaults to 24x24", () => {
    expect(resolveDimensions({ kind: "registry", icon: { body: "" }, iconSet: {} })).toEqual({
      width: 24,
      height: 24,
      viewBox: "0 0 24 24",
    });
  });

  it("uses collection defaults", () => {
    expect(resolveDimensions({ kind: "registry", icon: { body: "" }, iconSet: { width: 16, height: 16 } })).toEqual({
      width: 16,
      height: 16,
      viewBox: "0 0 16 16",
    });
  });

  it("prefers icon values over collection defaults", () => {
    const dimensions = resolveDimensions({
      kind: "registry",
      icon: { body: "", width: 20 },
      iconSet: { width: 16, height: 16 },
    });
    expect(dimensions).toEqual({ width: 20, height: 16, viewBox: "0 0 20 16" });
  });

  it("uses the icon's own viewBox", () => {
    const dimensions = resolveDimensions({
      kind: "registry",
      icon: { body: "", width: 24, height: 24, viewBox: "0 0 512 512" },
      iconSet: {},
    });
    expect(dimensions).toEqual({ width: 24, height: 24, viewBox: "0 0 512 512" });
  });

  it("applies left and top offsets", () => {
    const dimensions = resolveDimensions({
      kind: "registry",
      icon: { body: "", top: 1 },
      iconSet: { left: -2, top: 0, width: 20, height: 20 },
    });
    expect(dimensions).toEqual({ width: 20, height: 20, viewBox: "-2 1 20 20" });
  });
});
