import { copyFile, cp, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { DataFetchError, PathTraversalError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError, isErrnoException } from "../nodePrimitives.js";
import { resolveWithin } from "../paths.js";

const DataEntrySchema = z
  .object({
    name: z.string().trim().min(1),
    source_type: z.enum(["url", "backpack", "local"]),
    source: z.string().trim().min(1),
    target_location: z.string().trim().min(1),
  })
  .strict();

const DataSpecSchema = z
  .object({
    data: z.array(DataEntrySchema).default([]),
  })
  .passthrough();

export type DataEntry = z.infer<typeof DataEntrySchema>;
export type DataSpec = z.infer<typeof DataSpecSchema>;

/** Per-entry result of {@link ensureDataIsFetched}. */
export interface DataFetchResult {
  name: string;
  target: string;
  status: "fetched" | "present";
}

/** Downloads {@link url} and resolves with its body. */
export type Downloader = (url: string) => Promise<Uint8Array>;

const fetchDownloader: Downloader = async (url) => {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`GET ${url} answered ${response.status} ${response.statusText}`);
  }
  return new Uint8Array(await response.arrayBuffer());
};

export interface DataFetchOptions {
  readonly logger?: StructuredLogger;
  readonly download?: Downloader;
}

/** Signature of the data-fetching collaborator consumed by `run()`. */
export type DataFetcher = (specPath: string, backpackRoot: string) => Promise<DataFetchResult[]>;

/**
 * Parses a `data.yml` document.
 *
 * @throws {DataFetchError} When the document is not valid YAML or does not match the schema.
 */
export function parseDataSpec(source: string, origin = "data spec"): DataSpec {
  let payload: unknown;
  try {
    payload = parseYaml(source);
  } catch (error) {
    throw new DataFetchError(`${origin} is not valid YAML: ${describeError(error)}`, { origin }, error);
  }

  const parsed = DataSpecSchema.safeParse(payload ?? {});
  if (!parsed.success) {
    throw new DataFetchError(`${origin} is invalid`, { origin, issues: parsed.error.flatten() });
  }
  return parsed.data;
}

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

/**
 * Makes sure every entry of the spec at {@link specPath} is present under
 * {@link backpackRoot}. Entries whose target already exists are left alone,
 * so calling it twice fetches nothing the second time.
 */
export async function ensureDataIsFetched(
  specPath: string,
  backpackRoot: string,
  options: DataFetchOptions = {},
): Promise<DataFetchResult[]> {
  const download = options.download ?? fetchDownloader;
  const root = path.resolve(backpackRoot);

  let source: string;
  try {
    source = await readFile(specPath, "utf8");
  } catch (error) {
    throw new DataFetchError(`cannot read data spec ${specPath}: ${describeError(error)}`, { specPath }, error);
  }
  const spec = parseDataSpec(source, specPath);

  const results: DataFetchResult[] = [];
  for (const entry of spec.data) {
    const target = resolveWithin(root, entry.target_location);
    if (await exists(target)) {
      options.logger?.info("data_already_present", { name: entry.name, target });
      results.push({ name: entry.name, target, status: "present" });
      continue;
    }

    options.logger?.info("data_fetch_started", { name: entry.name, source_type: entry.source_type, source: entry.source });
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await fetchEntry(entry, root, target, download);
    } catch (error) {
      if (error instanceof PathTraversalError || error instanceof DataFetchError) {
        throw error;
      }
      throw new DataFetchError(
        `failed to fetch ${entry.name} from ${entry.source}: ${describeError(error)}`,
        { name: entry.name, source: entry.source, sourceType: entry.source_type },
        error,
      );
    }
    options.logger?.info("data_fetched", { name: entry.name, target });
    results.push({ name: entry.name, target, status: "fetched" });
  }

  return results;
}

async function fetchEntry(entry: DataEntry, root: string, target: string, download: Downloader): Promise<void> {
  switch (entry.source_type) {
    case "url":
      await writeFile(target, await download(entry.source));
      return;
    case "backpack":
      await copyPath(resolveWithin(root, entry.source), target);
      return;
    case "local":
      await copyPath(path.resolve(entry.source), target);
      return;
  }
}

async function copyPath(source: string, target: string): Promise<void> {
  const stats = await stat(source);
  if (stats.isDirectory()) {
    await cp(source, target, { recursive: true });
  } else {
    await copyFile(source, target);
  }
}
