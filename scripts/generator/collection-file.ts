import { readdir, readFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import type { CollectionInfo, IconRecord, ResolvedIcon } from "../../typings/icon-record.js";
import { IconsmithError, isMissingFile, toItemFailure, type ItemFailure } from "../errors.js";
import { constName, moduleName } from "../utils/naming.js";
import { writeFileAtomic } from "../utils/write-file-atomic.js";

export const GENERATED_MARKER = "// Generated by iconsmith.";
export const MANIFEST_FILE = "index.ts";

export interface CollectionEntry {
  constName: string;
  fullName: string;
  record: IconRecord;
}

export interface CollectionFileContent {
  info: CollectionInfo;
  entries: CollectionEntry[];
}

export interface EmitResult {
  path: string;
  written: ResolvedIcon[];
  failed: ItemFailure[];
}

const stringLiteral = String.raw`("(?:[^"\\\n]|\\.)*")`;
const entryPattern = new RegExp(
  [
    String.raw`^export const ([^\s:]+): IconData = \{`,
    String.raw`  name: ${stringLiteral},`,
    String.raw`  body: ${stringLiteral},`,
    String.raw`  width: (\d+),`,
    String.raw`  height: (\d+),`,
    String.raw`  viewBox: ${stringLiteral},`,
    String.raw`\};$`,
  ].join("\n"),
  "gm"
);
const infoPattern = /^\/\/ (Name|Author|License): (.*)$/gm;

function decodeString(literal: string): string {
  return z.string().parse(JSON.parse(literal));
}

export function parseCollectionFile(content: string): CollectionFileContent {
  const source = content.replace(/\r\n/g, "\n");
  const info: CollectionInfo = {};

  for (const [, field, value] of source.matchAll(infoPattern)) {
    if (field === "Name") info.name = value;
    else if (field === "Author") info.author = value;
    else info.license = value;
  }

  const entries = Array.from(source.matchAll(entryPattern), ([, name, fullName, body, width, height, viewBox]) => ({
    constName: name,
    fullName: decodeString(fullName),
    record: {
      body: decodeString(body),
      width: Number.parseInt(width, 10),
      height: Number.parseInt(height, 10),
      viewBox: decodeString(viewBox),
    },
  }));

  return { info, entries };
}

/**
 * Reads a generated collection module back. A missing file reads as an empty collection.
 */
export async function readCollectionFile(path: string): Promise<CollectionFileContent> {
  try {
    return parseCollectionFile(await readFile(path, "utf-8"));
  } catch (error) {
    if (isMissingFile(error)) {
      return { info: {}, entries: [] };
    }
    throw new IconsmithError("FilesystemFailure", `Failed to read ${path}: ${String(error)}`, path, { cause: error });
  }
}

function singleLine(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function renderCollectionFile(collection: string, info: CollectionInfo, entries: CollectionEntry[]): string {
  const header = [GENERATED_MARKER + " Entries are rewritten by `iconsmith add` and `iconsmith update`.", `// Collection: ${collection}`];
  if (info.name) header.push(`// Name: ${singleLine(info.name)}`);
  if (info.author) header.push(`// Author: ${singleLine(info.author)}`);
  if (info.license) header.push(`// License: ${singleLine(info.license)}`);

  const body = [...entries]
    .sort((a, b) => (a.constName < b.constName ? -1 : a.constName > b.constName ? 1 : 0))
    .map(
      ({ constName: name, fullName, record }) =>
        `export const ${name}: IconData = {\n` +
        `  name: ${JSON.stringify(fullName)},\n` +
        `  body: ${JSON.stringify(record.body)},\n` +
        `  width: ${record.width},\n` +
        `  height: ${record.height},\n` +
        `  viewBox: ${JSON.stringify(record.viewBox)},\n` +
        `};\n`
    );

  return `${header.join("\n")}\n\nimport type { IconData } from "./index";\n\n${body.join("\n")}`;
}

export function collectionFilePath(outputDir: string, collection: string): string {
  return join(outputDir, `${moduleName({ collection })}.ts`);
}

/**
 * Merges icons into the collection's module: other entries are kept, an icon that is already present is replaced,
 * and a constant name claimed by a different icon is reported as `AmbiguousName` for that icon only.
 */
export async function emitCollection(
  outputDir: string,
  collection: string,
  icons: ResolvedIcon[],
  info?: CollectionInfo
): Promise<EmitResult> {
  const path = collectionFilePath(outputDir, collection);
  const existing = await readCollectionFile(path);

  const entries = new Map(existing.entries.map((entry) => [entry.constName, entry]));
  const constByFullName = new Map(existing.entries.map((entry) => [entry.fullName, entry.constName]));
  const written: ResolvedIcon[] = [];
  const failed: ItemFailure[] = [];

  for (const icon of icons) {
    const { fullName } = icon.identifier;
    try {
      const name = constName(icon.identifier);
      const owner = entries.get(name);
      if (owner && owner.fullName !== fullName) {
        throw new IconsmithError(
          "AmbiguousName",
          `Constant '${name}' for ${fullName} is already used by ${owner.fullName}`,
          fullName
        );
      }

      const previousName = constByFullName.get(fullName);
      if (previousName !== undefined && previousName !== name) {
        entries.delete(previousName);
      }

      entries.set(name, { constName: name, fullName, record: icon.record });
      constByFullName.set(fullName, name);
      written.push(icon);
    } catch (error) {
      failed.push(toItemFailure(fullName, error, "AmbiguousName"));
    }
  }

  if (written.length > 0) {
    const content = renderCollectionFile(collection, info ?? existing.info, Array.from(entries.values()));
    await writeFileAtomic(path, content);
  }

  return { path, written, failed };
}

/**
 * Paths of every generated collection module in `outputDir`; the manifest and foreign files are left out.
 */
export async function listCollectionFiles(outputDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(outputDir);
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw new IconsmithError("FilesystemFailure", `Failed to read ${outputDir}: ${String(error)}`, outputDir, {
      cause: error,
    });
  }

  const files: string[] = [];
  for (const name of names.sort()) {
    if (!name.endsWith(".ts") || name.endsWith(".d.ts") || name === MANIFEST_FILE) continue;
    const path = join(outputDir, name);
    const content = await readFile(path, "utf-8");
    if (content.startsWith(GENERATED_MARKER)) {
      files.push(path);
    }
  }
  return files;
}

export async function readAllEntries(outputDir: string): Promise<CollectionEntry[]> {
  const files = await listCollectionFiles(outputDir);
  const contents = await Promise.all(files.map(readCollectionFile));
  return contents.flatMap((content) => content.entries);
}
