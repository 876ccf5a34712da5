import { describe, expect, it } from "vitest";
import {
  composeIconIdentifier,
  constName,
  isReservedWord,
  moduleName,
  parseIconIdentifier,
  splitWords,
  toConstName,
} from "../scripts/utils/naming.js";
import { catchError } from "./helpers.js";

describe("parseIconIdentifier", () => {
  it("splits collection and icon name", () => {
    expect(parseIconIdentifier("mdi:home")).toEqual({ collection: "mdi", iconName: "home", fullName: "mdi:home" });
  });

  it("trims both sides and normalizes fullName", () => {
    const identifier = parseIconIdentifier(" simple-icons : github ");
    expect(identifier.collection).toBe("simple-icons");
    expect(identifier.iconName).toBe("github");
    expect(identifier.fullName).toBe("simple-icons:github");
  });

  it("round-trips through fullName", () => {
    const identifier = parseIconIdentifier("lucide:arrow-left");
    expect(parseIconIdentifier(identifier.fullName)).toEqual(identifier);
  });

  it("returns a frozen identifier", () => {
    expect(Object.isFrozen(parseIconIdentifier("mdi:home"))).toBe(true);
  });

  it("rejects input without exactly one colon", () => {
    expect(() => parseIconIdentifier("mdi")).toThrow(
      "Invalid icon identifier format. Expected 'collection:icon-name', got 'mdi'"
    );
    expect(() => parseIconIdentifier("mdi:home:extra")).toThrow(
      "Invalid icon identifier format. Expected 'collection:icon-name', got 'mdi:home:extra'"
    );
  });

  it("rejects empty segments", () => {
    expect(() => parseIconIdentifier(":home")).toThrow("Both collection and icon name must be non-empty in ':home'");
    expect(() => parseIconIdentifier("mdi:  ")).toThrow("Both collection and icon name must be non-empty in 'mdi:  '");
  });

  it("reports the error kind", () => {
    expect(catchError(() => parseIconIdentifier(""))).toMatchObject({ kind: "InvalidIdentifierFormat" });
  });
});

describe("composeIconIdentifier", () => {
  it("builds the same identifier as parsing", () => {
    expect(composeIconIdentifier("test-icons", "arrows-left")).toEqual(parseIconIdentifier("test-icons:arrows-left"));
  });
});

describe("splitWords", () => {
  it("breaks on separators, case changes, digits and acronyms", () => {
    expect(splitWords("arrow-left_bold icon.v2")).toEqual(["arrow", "left", "bold", "icon", "v", "2"]);
    expect(splitWords("HTTPServer")).toEqual(["HTTP", "Server"]);
    expect(splitWords("camelCase")).toEqual(["camel", "Case"]);
  });
});

describe("toConstName", () => {
  it.each([
    ["home", "Home"],
    ["arrow-left", "ArrowLeft"],
    ["arrow_left", "ArrowLeft"],
    ["numeric-1-box", "Numeric1Box"],
    ["HTTPServer", "HttpServer"],
    ["ALARM-light", "AlarmLight"],
    ["1password", "_1Password"],
    ["24-hours", "_24Hours"],
  ])("%s -> %s", (iconName, expected) => {
    expect(toConstName(iconName)).toBe(expected);
  });

  it("suffixes reserved words", () => {
    expect(toConstName("type")).toBe("TypeIcon");
    expect(toConstName("delete")).toBe("DeleteIcon");
    expect(toConstName("class")).toBe("ClassIcon");
  });

  it("suffixes names of the generated bindings", () => {
    expect(toConstName("icon-data")).toBe("IconDataIcon");
    expect(toConstName("render-icon")).toBe("RenderIconIcon");
  });

  it("is idempotent", () => {
    for (const iconName of ["arrow-left", "1password", "type", "numeric-1-box", "HTTPServer"]) {
      const once = toConstName(iconName);
      expect(toConstName(once)).toBe(once);
    }
  });

  it("rejects names without letters or digits", () => {
    expect(() => toConstName("---")).toThrow("Cannot derive a constant name from icon name '---'");
  });

  it("is exposed per identifier", () => {
    expect(constName(parseIconIdentifier("mdi:account-circle"))).toBe("AccountCircle");
  });
});

describe("isReservedWord", () => {
  it("compares case-insensitively", () => {
    expect(isReservedWord("Type")).toBe(true);
    expect(isReservedWord("DEFAULT")).toBe(true);
    expect(isReservedWord("Home")).toBe(false);
  });
});

describe("moduleName", () => {
  it("replaces dashes with underscores", () => {
    expect(moduleName({ collection: "simple-icons" })).toBe("simple_icons");
    expect(moduleName({ collection: "mdi" })).toBe("mdi");
  });

  it("rejects collections that are not valid identifiers", () => {
    expect(() => moduleName({ collection: "1st-icons" })).toThrow(
      "Collection '1st-icons' does not map to a valid module name"
    );
    expect(catchError(() => moduleName({ collection: "my icons" }))).toMatchObject({
      kind: "InvalidIdentifierFormat",
    });
  });

  it("rejects collections that would overwrite the index module", () => {
    expect(() => moduleName({ collection: "index" })).toThrow(
      "Collection 'index' would replace the generated index.ts module"
    );
    expect(catchError(() => moduleName({ collection: "Index" }))).toMatchObject({
      kind: "InvalidIdentifierFormat",
      subject: "Index",
    });
  });
});
