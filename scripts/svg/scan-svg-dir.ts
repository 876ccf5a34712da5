import { readdir, stat } from "fs/promises";
import { basename, extname, join, relative, resolve, sep } from "path";
import { IconsmithError } from "../errors.js";
import { logEntry } from "../utils/build-log.js";

export interface ScannedSvg {
  path: string;
  iconName: string;
}

/**
 * Collection name of a local directory: its own final path segment (`./assets/my-icons` -> `my-icons`).
 */
export function extractCollectionName(dir: string): string {
  const name = basename(resolve(dir));
  if (!name) {
    throw new IconsmithError("MalformedSource", `Invalid directory name: ${dir}`, dir);
  }
  return name;
}

/**
 * Icon name of an SVG file relative to the scanned directory: `arrows/left.svg` -> `arrows-left`.
 */
export function buildIconName(baseDir: string, svgPath: string): string {
  const relativePath = relative(resolve(baseDir), resolve(svgPath));
  if (!relativePath || relativePath.startsWith("..")) {
    throw new IconsmithError("MalformedSource", `SVG path is not under base directory: ${svgPath}`, svgPath);
  }

  const parts = relativePath.split(sep).filter(Boolean);
  const last = parts.length - 1;
  parts[last] = basename(parts[last], extname(parts[last]));

  const iconName = parts.join("-");
  if (!iconName) {
    throw new IconsmithError("MalformedSource", `Failed to build icon name from path: ${svgPath}`, svgPath);
  }
  return iconName;
}

async function collectSvgFiles(dir: string, found: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    // Dirent reports links as links, so neither linked files nor linked directories are followed
    if (entry.isSymbolicLink()) continue;

    if (entry.isDirectory()) {
      await collectSvgFiles(fullPath, found);
    } else if (entry.isFile() && extname(entry.name) === ".svg") {
      found.push(fullPath);
    }
  }
}

/**
 * Recursively finds `.svg` files under `dir`. Result order follows the directory listing and is not guaranteed.
 */
export async function scanSvgDirectory(dir: string): Promise<ScannedSvg[]> {
  const isDirectory = await stat(dir).then(
    (stats) => stats.isDirectory(),
    () => false
  );
  if (!isDirectory) {
    throw new IconsmithError("FilesystemFailure", `Not a directory: ${dir}`, dir);
  }

  const files: string[] = [];
  try {
    await collectSvgFiles(dir, files);
  } catch (error) {
    throw new IconsmithError("FilesystemFailure", `Failed to scan ${dir}: ${String(error)}`, dir, { cause: error });
  }

  if (files.length === 0) {
    logEntry("parse", "warn", `No SVG files found in ${dir}`, { dir });
  }

  return files.map((path) => ({ path, iconName: buildIconName(dir, path) }));
}
