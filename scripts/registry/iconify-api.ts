import { z } from "zod";
import type { CollectionInfo, IconFetcher, RegistryIconSet } from "../../typings/icon-record.js";
import { IconsmithError } from "../errors.js";

const dimension = z.number().int().positive().optional();
const offset = z.number().optional();

const iconSchema = z.object({
  body: z.string(),
  width: dimension,
  height: dimension,
  left: offset,
  top: offset,
  viewBox: z.string().optional(),
});

const iconSetSchema = z.object({
  prefix: z.string(),
  icons: z.record(iconSchema).default({}),
  width: dimension,
  height: dimension,
  left: offset,
  top: offset,
  not_found: z.array(z.string()).optional(),
});

const collectionInfoSchema = z.object({
  info: z
    .object({
      name: z.string().optional(),
      author: z.object({ name: z.string().optional() }).optional(),
      license: z.object({ title: z.string().optional(), spdx: z.string().optional() }).optional(),
    })
    .optional(),
});

export interface IconifyClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Fetch collaborator backed by the Iconify HTTP API. One request per call, no retries.
 */
export class IconifyClient implements IconFetcher {
  constructor(private readonly options: IconifyClientOptions) {}

  async fetchIcons(collection: string, names: string[]): Promise<RegistryIconSet> {
    if (names.length === 0) {
      return { icons: {}, notFound: [] };
    }

    const query = names.map(encodeURIComponent).join(",");
    const url = `${this.options.baseUrl}/${encodeURIComponent(collection)}.json?icons=${query}`;
    const payload = iconSetSchema.safeParse(await this.getJson(url, `icons from collection '${collection}'`));
    if (!payload.success) {
      throw new IconsmithError(
        "TransportFailure",
        `Failed to parse API response for collection '${collection}': ${payload.error.message}`,
        collection
      );
    }

    const { icons, width, height, left, top, not_found: notFound = [] } = payload.data;
    return { icons, width, height, left, top, notFound };
  }

  async fetchCollectionInfo(collection: string): Promise<CollectionInfo> {
    const url = `${this.options.baseUrl}/collection?prefix=${encodeURIComponent(collection)}&info=true`;
    const payload = collectionInfoSchema.safeParse(await this.getJson(url, `info for collection '${collection}'`));
    if (!payload.success || !payload.data.info) {
      throw new IconsmithError("TransportFailure", `No collection info returned for '${collection}'`, collection);
    }

    const { name, author, license } = payload.data.info;
    return { name, author: author?.name, license: license?.title ?? license?.spdx };
  }

  private async getJson(url: string, what: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      throw new IconsmithError("TransportFailure", `Failed to fetch ${what}: ${String(error)}`, url, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new IconsmithError(
        "TransportFailure",
        `API request failed with status ${response.status}${text ? `: ${text.trim()}` : ""}`,
        url
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new IconsmithError("TransportFailure", `Failed to parse API response for ${what}`, url, { cause: error });
    }
  }
}
