import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import type { CollectionInfo, IconFetcher, RegistryIconSet } from "../typings/icon-record.js";
import { IconsmithError } from "../scripts/errors.js";

export const fixturesDir = fileURLToPath(new URL("./fixtures", import.meta.url));
export const testIconsDir = join(fixturesDir, "test-icons");

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "iconsmith-"));
}

export async function removeTempDir(dir: string) {
  await rm(dir, { recursive: true, force: true });
}

export type FakeIconSet = Omit<RegistryIconSet, "notFound">;

/**
 * In-memory registry. Unknown collections and collections listed in `failing` reject like a failed HTTP request.
 */
export class FakeFetcher implements IconFetcher {
  readonly requests: Array<{ collection: string; names: string[] }> = [];
  readonly infoRequests: string[] = [];
  readonly failing = new Set<string>();

  constructor(
    public sets: Record<string, FakeIconSet> = {},
    public info: Record<string, CollectionInfo> = {}
  ) {}

  async fetchIcons(collection: string, names: string[]): Promise<RegistryIconSet> {
    this.requests.push({ collection, names });
    const set = this.sets[collection];
    if (this.failing.has(collection)) {
      throw new IconsmithError("TransportFailure", "API request failed with status 503", collection);
    }
    if (!set) {
      throw new IconsmithError("TransportFailure", "API request failed with status 404: Not found", collection);
    }

    const found = names.filter((name) => Object.hasOwn(set.icons, name));
    return {
      ...set,
      icons: Object.fromEntries(found.map((name) => [name, set.icons[name]])),
      notFound: names.filter((name) => !Object.hasOwn(set.icons, name)),
    };
  }

  async fetchCollectionInfo(collection: string): Promise<CollectionInfo> {
    this.infoRequests.push(collection);
    const info = this.info[collection];
    if (!info) {
      throw new IconsmithError("TransportFailure", `No collection info returned for '${collection}'`, collection);
    }
    return info;
  }
}

export function catchError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the action to throw");
}
