import { stat } from "fs/promises";
import { basename, dirname, extname, resolve } from "path";
import { from, lastValueFrom, mergeMap, toArray } from "rxjs";
import type {
  CollectionInfo,
  IconFetcher,
  IconIdentifier,
  IconRecord,
  RegistryIconSet,
  ResolvedIcon,
} from "../typings/icon-record.js";
import { IconsmithError, hasErrorCode, toItemFailure, type ItemFailure } from "./errors.js";
import { emitCollection, readAllEntries } from "./generator/collection-file.js";
import { ensureInitialized, forceRegenerate, registerCollections } from "./generator/module-file.js";
import { resolveDimensions } from "./svg/dimensions.js";
import { parseSvgFile } from "./svg/parse-svg.js";
import { extractCollectionName, scanSvgDirectory, type ScannedSvg } from "./svg/scan-svg-dir.js";
import { logEntry, resetRunLog } from "./utils/build-log.js";
import { composeIconIdentifier, parseIconIdentifier } from "./utils/naming.js";
import { progressSpinner, updateProgress } from "./utils/progress-bar.js";

export interface IconsmithContext {
  outputDir: string;
  fetcher: IconFetcher;
  batchSize?: number;
}

export interface AddOptions {
  skipExisting?: boolean;
}

export interface RunResult {
  added: string[];
  skipped: string[];
  failed: ItemFailure[];
  collections: string[];
}

export type InputKind = "registry" | "file" | "directory" | "unsupported";

// Bookkeeping shared by the stages of one add/update run
interface RunState {
  resolved: ResolvedIcon[];
  skipped: string[];
  failed: ItemFailure[];
  existing: Set<string>;
  registryCollections: Set<string>;
}

function newRunState(existing: Set<string> = new Set()): RunState {
  return { resolved: [], skipped: [], failed: [], existing, registryCollections: new Set() };
}

function fail(state: RunState, stage: "classify" | "fetch" | "parse" | "emit", input: string, error: unknown) {
  const failure = toItemFailure(input, error, stage === "fetch" ? "TransportFailure" : "MalformedSource");
  state.failed.push(failure);
  logEntry(stage, "warn", `Skipping ${input}: ${failure.message}`, { kind: failure.kind });
}

// Returns false (and records the skip) when the icon is already generated and existing icons are being skipped
function admit(state: RunState, identifier: IconIdentifier): boolean {
  if (!state.existing.has(identifier.fullName)) return true;
  state.skipped.push(identifier.fullName);
  logEntry("classify", "info", `  Skipping existing icon: ${identifier.fullName}`);
  return false;
}

/**
 * Existing directories are SVG directories, existing `.svg` files are SVG files, anything that is not a path on disk
 * is a registry identifier.
 */
export async function classifyInput(input: string): Promise<InputKind> {
  const stats = await stat(input).catch((error: unknown) => {
    // a path component that is a file (ENOTDIR) means the input is not a path either
    if (hasErrorCode(error, "ENOENT", "ENOTDIR")) return undefined;
    throw new IconsmithError("FilesystemFailure", `Cannot inspect ${input}: ${String(error)}`, input, { cause: error });
  });

  if (!stats) return "registry";
  if (stats.isDirectory()) return "directory";
  if (stats.isFile() && extname(input) === ".svg") return "file";
  return "unsupported";
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function groupByCollection<T extends { collection: string }>(items: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const group = groups.get(item.collection) ?? [];
    group.push(item);
    groups.set(item.collection, group);
  }
  return groups;
}

async function resolveLocalFile(state: RunState, identifier: IconIdentifier, path: string) {
  if (!admit(state, identifier)) return;
  try {
    const record = await parseSvgFile(path);
    state.resolved.push({ identifier, record });
    logEntry("parse", "info", `  ${identifier.fullName} ✓`);
  } catch (error) {
    fail(state, "parse", path, error);
  }
}

async function resolveSvgFile(state: RunState, path: string) {
  let identifier: IconIdentifier;
  try {
    const collection = extractCollectionName(dirname(resolve(path)));
    identifier = composeIconIdentifier(collection, basename(path, extname(path)));
  } catch (error) {
    fail(state, "parse", path, error);
    return;
  }
  await resolveLocalFile(state, identifier, path);
}

async function resolveSvgDirectory(state: RunState, dir: string) {
  let collection: string;
  let files: ScannedSvg[];
  try {
    collection = extractCollectionName(dir);
    files = await scanSvgDirectory(dir);
  } catch (error) {
    fail(state, "parse", dir, error);
    return;
  }

  if (files.length > 0) {
    logEntry("parse", "info", `  Found ${files.length} SVG(s) in ${dir}`);
  }

  let progress = 0;
  const failedBefore = state.failed.length;
  for (const { path, iconName } of files) {
    try {
      await resolveLocalFile(state, composeIconIdentifier(collection, iconName), path);
    } catch (error) {
      // file names that cannot form an identifier, e.g. ones containing a colon
      fail(state, "parse", path, error);
    }
    updateProgress(++progress, files.length, `Parsing ${collection}`, state.failed.length - failedBefore);
  }
}

function toRecord(state: RunState, identifier: IconIdentifier, iconSet: RegistryIconSet) {
  const icon = Object.hasOwn(iconSet.icons, identifier.iconName) ? iconSet.icons[identifier.iconName] : undefined;
  if (!icon) {
    fail(
      state,
      "fetch",
      identifier.fullName,
      new IconsmithError(
        "NotFound",
        `Icon '${identifier.iconName}' not found in collection '${identifier.collection}'`,
        identifier.fullName
      )
    );
    return;
  }

  const record: IconRecord = Object.freeze({
    body: icon.body,
    ...resolveDimensions({ kind: "registry", icon, iconSet }),
  });
  state.resolved.push({ identifier, record });
}

/**
 * Fetches registry icons one batch at a time: batches never overlap, and a failed batch fails only its own icons.
 */
async function resolveRegistryIcons(state: RunState, identifiers: IconIdentifier[], context: IconsmithContext) {
  const admitted = identifiers.filter((identifier) => admit(state, identifier));
  if (admitted.length === 0) return;

  logEntry("fetch", "info", `Fetching ${admitted.length} icon(s) from the icon registry...`);

  const batches = Array.from(groupByCollection(admitted)).flatMap(([collection, group]) =>
    chunk(group, context.batchSize ?? 32).map((batch) => ({ collection, batch }))
  );

  const fetch$ = from(batches).pipe(
    mergeMap(async ({ collection, batch }) => {
      const stopSpinner = progressSpinner(`Fetching ${batch.length} icon(s) from ${collection}`);
      let iconSet: RegistryIconSet;
      try {
        iconSet = await context.fetcher.fetchIcons(
          collection,
          batch.map((identifier) => identifier.iconName)
        );
      } catch (error) {
        for (const identifier of batch) {
          fail(state, "fetch", identifier.fullName, error);
        }
        return;
      } finally {
        stopSpinner();
      }

      state.registryCollections.add(collection);
      for (const identifier of batch) {
        toRecord(state, identifier, iconSet);
      }
    }, 1),
    toArray()
  );

  await lastValueFrom(fetch$, { defaultValue: [] });
}

/**
 * Collection metadata is optional: a failed lookup is a warning and the collection is emitted without it.
 */
async function fetchCollectionInfo(state: RunState, context: IconsmithContext): Promise<Map<string, CollectionInfo>> {
  const wanted = new Set(state.resolved.map(({ identifier }) => identifier.collection));
  const collections = Array.from(state.registryCollections).filter((collection) => wanted.has(collection));
  const info = new Map<string, CollectionInfo>();
  if (collections.length === 0) return info;

  logEntry("fetch", "info", "Fetching collection metadata...");
  const info$ = from(collections).pipe(
    mergeMap(async (collection) => {
      try {
        info.set(collection, await context.fetcher.fetchCollectionInfo(collection));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logEntry("fetch", "warn", `Collection info for ${collection} skipped: ${message}`);
      }
    }, 1),
    toArray()
  );
  await lastValueFrom(info$, { defaultValue: [] });
  return info;
}

async function emitAll(state: RunState, context: IconsmithContext, info: Map<string, CollectionInfo>) {
  const added: string[] = [];
  const collections: string[] = [];
  const groups = groupByCollection(state.resolved.map((icon) => ({ collection: icon.identifier.collection, icon })));

  for (const [collection, group] of groups) {
    const icons = group.map(({ icon }) => icon);
    try {
      const result = await emitCollection(context.outputDir, collection, icons, info.get(collection));
      for (const failure of result.failed) {
        state.failed.push(failure);
        logEntry("emit", "warn", `Skipping ${failure.input}: ${failure.message}`, { kind: failure.kind });
      }
      if (result.written.length > 0) {
        added.push(...result.written.map(({ identifier }) => identifier.fullName));
        collections.push(collection);
        logEntry("emit", "info", `  ${result.path} (${result.written.length} icon(s))`);
      }
    } catch (error) {
      for (const icon of icons) {
        fail(state, "emit", icon.identifier.fullName, error);
      }
    }
  }

  return { added, collections };
}

async function existingIdentifiers(outputDir: string): Promise<string[]> {
  const entries = await readAllEntries(outputDir);
  return entries.map((entry) => entry.fullName);
}

export function createIconsmith(context: IconsmithContext) {
  const { outputDir } = context;

  async function init(): Promise<boolean> {
    resetRunLog("init");
    const created = await ensureInitialized(outputDir);
    logEntry("manifest", "info", created ? `Created ${outputDir}/index.ts` : `${outputDir}/index.ts already exists`);
    return created;
  }

  async function add(inputs: string[], options: AddOptions = {}): Promise<RunResult> {
    resetRunLog("add");
    const state = newRunState(options.skipExisting ? new Set(await existingIdentifiers(outputDir)) : new Set());

    const registry: IconIdentifier[] = [];
    const seen = new Set<string>();
    const local: Array<{ kind: "file" | "directory"; input: string }> = [];

    for (const input of inputs) {
      try {
        const kind = await classifyInput(input);
        if (kind === "unsupported") {
          throw new IconsmithError("MalformedSource", `Path exists but is not an SVG file or directory: ${input}`, input);
        }
        if (kind !== "registry") {
          local.push({ kind, input });
          continue;
        }
        const identifier = parseIconIdentifier(input);
        if (!seen.has(identifier.fullName)) {
          seen.add(identifier.fullName);
          registry.push(identifier);
        }
      } catch (error) {
        fail(state, "classify", input, error);
      }
    }

    await resolveRegistryIcons(state, registry, context);

    if (local.length > 0) {
      logEntry("parse", "info", `Processing ${local.length} local SVG source(s)...`);
    }
    const local$ = from(local).pipe(
      mergeMap(
        ({ kind, input }) => (kind === "directory" ? resolveSvgDirectory(state, input) : resolveSvgFile(state, input)),
        1
      ),
      toArray()
    );
    await lastValueFrom(local$, { defaultValue: [] });

    if (state.resolved.length === 0) {
      const message = state.skipped.length > 0 ? "All icons already exist, nothing to add" : "No icons to add";
      logEntry("emit", "info", message);
      return { added: [], skipped: state.skipped, failed: state.failed, collections: [] };
    }

    const info = await fetchCollectionInfo(state, context);
    const { added, collections } = await emitAll(state, context, info);
    if (collections.length > 0) {
      const registered = await registerCollections(outputDir, collections);
      if (registered.length > 0) {
        logEntry("manifest", "info", `Registered ${registered.join(", ")} in ${outputDir}/index.ts`);
      }
    }

    return { added, skipped: state.skipped, failed: state.failed, collections };
  }

  /**
   * Every generated icon, grouped by collection. Collections and names are sorted.
   */
  async function list(): Promise<Map<string, string[]>> {
    const byCollection = new Map<string, Set<string>>();
    for (const fullName of await existingIdentifiers(outputDir)) {
      const collection = fullName.split(":")[0];
      const names = byCollection.get(collection) ?? new Set<string>();
      names.add(fullName);
      byCollection.set(collection, names);
    }

    return new Map(
      Array.from(byCollection.keys())
        .sort()
        .map((collection): [string, string[]] => [collection, Array.from(byCollection.get(collection) ?? []).sort()])
    );
  }

  /**
   * Re-fetches every generated icon from the registry and rewrites the manifest's shared definitions. Icons that only
   * exist locally fail the fetch and keep their current entry.
   */
  async function update(): Promise<RunResult> {
    resetRunLog("update");
    const state = newRunState();
    const identifiers: IconIdentifier[] = [];

    for (const fullName of new Set(await existingIdentifiers(outputDir))) {
      try {
        identifiers.push(parseIconIdentifier(fullName));
      } catch (error) {
        fail(state, "classify", fullName, error);
      }
    }

    let result: RunResult = { added: [], skipped: [], failed: state.failed, collections: [] };
    if (identifiers.length === 0) {
      logEntry("fetch", "info", "No icons to update");
    } else {
      logEntry("fetch", "info", `Found ${identifiers.length} icon(s) to update`);
      await resolveRegistryIcons(state, identifiers, context);

      if (state.resolved.length === 0) {
        logEntry("fetch", "error", "Failed to fetch any icons");
      } else {
        const info = await fetchCollectionInfo(state, context);
        const { added, collections } = await emitAll(state, context, info);
        result = { added, skipped: [], failed: state.failed, collections };
      }
    }

    const modules = await forceRegenerate(outputDir);
    logEntry("manifest", "info", `Regenerated ${outputDir}/index.ts (${modules.length} collection(s))`);
    return result;
  }

  return { init, add, list, update };
}

export type Iconsmith = ReturnType<typeof createIconsmith>;
