import { readFileSync } from "fs";
import { z } from "zod";
import type { IconIdentifier } from "../../typings/icon-record.js";
import { IconsmithError } from "../errors.js";

const reservedWordsSchema = z.object({
  keywords: z.array(z.string()),
  generatedBindings: z.array(z.string()),
});

// data/ sits two levels above this module both in scripts/utils and in dist/utils
const reservedWordsFile = new URL("../../data/reserved-words.json", import.meta.url);
const reservedWords = reservedWordsSchema.parse(JSON.parse(readFileSync(reservedWordsFile, "utf-8")));
const reserved = new Set([...reservedWords.keywords, ...reservedWords.generatedBindings].map((word) => word.toLowerCase()));

export const KEYWORD_SUFFIX = "Icon";

const identifierPattern = /^[\p{L}_$][\p{L}\p{Nd}_$]*$/u;
// Base names of files the generator owns besides collection modules; compared case-insensitively
const reservedModuleNames = new Set(["index"]);
// Lowercase words with an optional capital, acronym runs, digit runs, then caseless letters
const wordPattern = /\p{Lu}?\p{Ll}+|\p{Lu}+(?!\p{Ll})|\p{Nd}+|[\p{Lt}\p{Lm}\p{Lo}]+/gu;

/**
 * Parses `collection:icon-name`. Both sides are trimmed and must be non-empty, and there must be exactly one colon.
 */
export function parseIconIdentifier(input: string): IconIdentifier {
  const parts = input.split(":");
  if (parts.length !== 2) {
    throw new IconsmithError(
      "InvalidIdentifierFormat",
      `Invalid icon identifier format. Expected 'collection:icon-name', got '${input}'`,
      input
    );
  }

  const collection = parts[0].trim();
  const iconName = parts[1].trim();
  if (!collection || !iconName) {
    throw new IconsmithError(
      "InvalidIdentifierFormat",
      `Both collection and icon name must be non-empty in '${input}'`,
      input
    );
  }

  return Object.freeze({ collection, iconName, fullName: `${collection}:${iconName}` });
}

export function composeIconIdentifier(collection: string, iconName: string): IconIdentifier {
  return parseIconIdentifier(`${collection}:${iconName}`);
}

export function isReservedWord(name: string): boolean {
  return reserved.has(name.toLowerCase());
}

export function splitWords(name: string): string[] {
  return name
    .split(/[^\p{L}\p{Nd}]+/u)
    .flatMap((chunk) => chunk.match(wordPattern) ?? []);
}

function capitalize(word: string): string {
  const [first = "", ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join("").toLowerCase();
}

/**
 * PascalCase constant name for an icon name: `arrow-left` -> `ArrowLeft`, `1password` -> `_1Password`,
 * `type` -> `TypeIcon`. Applying it to its own output returns the output unchanged.
 */
export function toConstName(iconName: string): string {
  let constName = splitWords(iconName).map(capitalize).join("");

  if (!constName) {
    throw new IconsmithError(
      "InvalidIdentifierFormat",
      `Cannot derive a constant name from icon name '${iconName}'`,
      iconName
    );
  }

  if (/^\p{Nd}/u.test(constName)) {
    constName = `_${constName}`;
  }

  if (isReservedWord(constName)) {
    constName += KEYWORD_SUFFIX;
  }

  return constName;
}

export function constName(identifier: IconIdentifier): string {
  return toConstName(identifier.iconName);
}

// Module (and file) name of a collection: `simple-icons` -> `simple_icons`
export function moduleName(identifier: Pick<IconIdentifier, "collection">): string {
  const name = identifier.collection.replace(/-/g, "_");
  if (!identifierPattern.test(name)) {
    throw new IconsmithError(
      "InvalidIdentifierFormat",
      `Collection '${identifier.collection}' does not map to a valid module name`,
      identifier.collection
    );
  }
  if (reservedModuleNames.has(name.toLowerCase())) {
    throw new IconsmithError(
      "InvalidIdentifierFormat",
      `Collection '${identifier.collection}' would replace the generated ${name}.ts module`,
      identifier.collection
    );
  }
  return name;
}
