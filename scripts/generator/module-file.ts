import { readFile } from "fs/promises";
import { basename, join } from "path";
import { IconsmithError, isMissingFile } from "../errors.js";
import { moduleName } from "../utils/naming.js";
import { writeFileAtomic } from "../utils/write-file-atomic.js";
import { GENERATED_MARKER, MANIFEST_FILE, listCollectionFiles } from "./collection-file.js";

const MANIFEST_HEADER = [
  `${GENERATED_MARKER} Collection exports are appended by \`iconsmith add\`;`,
  "// the shared definitions below them are rewritten by `iconsmith init` and `iconsmith update`.",
];

const exportPattern = /^export \* as ([\p{L}\p{Nd}_$]+) from "\.\/([^"]+)";$/gmu;

// Host-facing record type and render entry point, kept verbatim in every manifest
export const SHARED_DEFINITIONS = `export interface IconData {
  /** \`collection:icon-name\` */
  name: string;
  /** SVG markup without the surrounding <svg> element */
  body: string;
  width: number;
  height: number;
  viewBox: string;
}

export interface IconRenderOptions {
  /** Sets both width and height */
  size?: number | string;
  width?: number | string;
  height?: number | string;
  className?: string;
  /** Accessible title; without one the icon is hidden from assistive technology */
  title?: string;
}

function escapeMarkup(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

/**
 * Renders an icon as standalone <svg> markup. Explicit width/height win over size, size wins over the icon's own size.
 */
export function renderIcon(data: IconData, options: IconRenderOptions = {}): string {
  const attributes: Array<[string, string | number | undefined]> = [
    ["xmlns", "http://www.w3.org/2000/svg"],
    ["width", options.width ?? options.size ?? data.width],
    ["height", options.height ?? options.size ?? data.height],
    ["viewBox", data.viewBox],
    ["class", options.className],
    ["role", options.title ? "img" : undefined],
    ["aria-hidden", options.title ? undefined : "true"],
  ];
  const rendered = attributes
    .filter((attribute): attribute is [string, string | number] => attribute[1] !== undefined && attribute[1] !== "")
    .map(([name, value]) => " " + name + '="' + escapeMarkup(String(value)) + '"')
    .join("");
  const title = options.title ? "<title>" + escapeMarkup(options.title) + "</title>" : "";
  return "<svg" + rendered + ">" + title + data.body + "</svg>";
}
`;

export function manifestPath(outputDir: string): string {
  return join(outputDir, MANIFEST_FILE);
}

function exportLine(module: string): string {
  return `export * as ${module} from "./${module}";`;
}

export function renderManifest(modules: Iterable<string>): string {
  const sorted = Array.from(new Set(modules)).sort();
  const exports = sorted.length > 0 ? `${sorted.map(exportLine).join("\n")}\n\n` : "";
  return `${MANIFEST_HEADER.join("\n")}\n\n${exports}${SHARED_DEFINITIONS}`;
}

export function parseRegisteredModules(content: string): string[] {
  return Array.from(content.replace(/\r\n/g, "\n").matchAll(exportPattern), ([, module]) => module);
}

async function readManifest(outputDir: string): Promise<string | undefined> {
  const path = manifestPath(outputDir);
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new IconsmithError("FilesystemFailure", `Failed to read ${path}: ${String(error)}`, path, { cause: error });
  }
}

async function modulesOnDisk(outputDir: string): Promise<string[]> {
  const files = await listCollectionFiles(outputDir);
  return files.map((file) => basename(file, ".ts"));
}

export async function readRegisteredCollections(outputDir: string): Promise<string[]> {
  const content = await readManifest(outputDir);
  return content === undefined ? [] : parseRegisteredModules(content);
}

/**
 * Creates the manifest when it is missing, exporting any collection modules already in `outputDir`.
 * Returns whether a file was written.
 */
export async function ensureInitialized(outputDir: string): Promise<boolean> {
  if ((await readManifest(outputDir)) !== undefined) {
    return false;
  }
  await writeFileAtomic(manifestPath(outputDir), renderManifest(await modulesOnDisk(outputDir)));
  return true;
}

/**
 * Adds an export for every collection not declared yet, after the existing exports. Nothing else in the file changes.
 * Returns the module names that were added.
 */
export async function registerCollections(outputDir: string, collections: string[]): Promise<string[]> {
  await ensureInitialized(outputDir);
  const content = (await readManifest(outputDir)) ?? renderManifest([]);

  const declared = new Set(parseRegisteredModules(content));
  const missing = Array.from(new Set(collections.map((collection) => moduleName({ collection }))))
    .filter((module) => !declared.has(module))
    .sort();
  if (missing.length === 0) {
    return [];
  }

  const lines = content.replace(/\r\n/g, "\n").split("\n");
  const lastExport = lines.reduce((last, line, index) => (line.startsWith("export * as ") ? index : last), -1);

  if (lastExport >= 0) {
    lines.splice(lastExport + 1, 0, ...missing.map(exportLine));
  } else {
    // no exports yet: they go right after the header block, followed by a blank line
    const headerEnd = lines.findIndex((line) => line.trim() === "");
    const insertAt = headerEnd < 0 ? 0 : headerEnd + 1;
    lines.splice(insertAt, 0, ...missing.map(exportLine), "");
  }

  await writeFileAtomic(manifestPath(outputDir), lines.join("\n"));
  return missing;
}

/**
 * Rewrites the whole manifest from the template, keeping every declared collection and every collection module on disk.
 */
export async function forceRegenerate(outputDir: string): Promise<string[]> {
  const modules = new Set([...(await readRegisteredCollections(outputDir)), ...(await modulesOnDisk(outputDir))]);
  await writeFileAtomic(manifestPath(outputDir), renderManifest(modules));
  return Array.from(modules).sort();
}
