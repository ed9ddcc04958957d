import { constants as fsConstants } from "node:fs";
import { access, lstat, mkdtemp, readlink, stat } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { AllocationError, PathTraversalError } from "./errors.js";
import { isErrnoException } from "./nodePrimitives.js";

/** Maximum number of characters preserved in a sanitised filename. */
const MAX_FILENAME_LENGTH = 120;

/** Upper bound on symlink hops followed while canonicalising a path. */
const MAX_SYMLINK_HOPS = 40;

/**
 * Whether {@link candidate} is {@link root} itself or one of its descendants.
 * Both paths must already be absolute and canonical.
 */
export function isWithinDirectory(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") {
    return true;
  }
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 * The check is lexical; use {@link canonicalizePath} first when symlinks on
 * disk must be taken into account.
 *
 * @throws {PathTraversalError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);

  if (!isWithinDirectory(absoluteRoot, targetPath)) {
    throw new PathTraversalError("path escapes base directory", targetPath, absoluteRoot);
  }

  return targetPath;
}

/**
 * Resolves {@link target} the way the kernel would when opening it. The path
 * is walked one component at a time: every existing component is followed
 * through symlinks (dangling ones included) before the next `..` applies, and
 * components that do not exist yet are appended verbatim. {@link target} is
 * read as written, so `a/../b` is only collapsed once `a` has been resolved.
 */
export async function canonicalizePath(target: string): Promise<string> {
  const absolute = path.isAbsolute(target) ? target : `${process.cwd()}${path.sep}${target}`;
  const pending = splitComponents(absolute);
  let resolved = path.parse(absolute).root;
  let missing = false;
  let hops = 0;

  for (let component = pending.shift(); component !== undefined; component = pending.shift()) {
    if (component === "" || component === ".") {
      continue;
    }
    if (component === "..") {
      resolved = path.dirname(resolved);
      continue;
    }

    const candidate = path.join(resolved, component);
    if (!missing) {
      const stats = await lstat(candidate).catch((error: unknown) => {
        if (isErrnoException(error, "ENOENT", "ENOTDIR")) {
          return null;
        }
        throw error;
      });
      if (stats?.isSymbolicLink()) {
        hops += 1;
        if (hops > MAX_SYMLINK_HOPS) {
          throw new Error(`too many levels of symbolic links while resolving ${target}`);
        }
        const linkTarget = await readlink(candidate);
        if (path.isAbsolute(linkTarget)) {
          resolved = path.parse(linkTarget).root;
        }
        pending.unshift(...splitComponents(linkTarget));
        continue;
      }
      missing = stats === null;
    }
    resolved = candidate;
  }

  return resolved;
}

function splitComponents(value: string): string[] {
  return value.split(path.sep === "/" ? /\/+/ : /[\\/]+/).filter((component) => component.length > 0);
}

/**
 * Sanitises a filename so it can safely be used as a directory prefix: path
 * separators, control characters and whitespace collapse to underscores.
 */
export function sanitizeFilename(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    return "unnamed";
  }

  const sanitised = trimmed
    .normalize("NFC")
    .replace(/[\0-\x1F\x7F]/g, "")
    .replace(/\.\./g, "")
    .replace(/[^\p{L}\p{N}._-]+/gu, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");

  const limited = sanitised.slice(0, MAX_FILENAME_LENGTH);
  return limited.length > 0 ? limited : "unnamed";
}

/** Compact UTC timestamp (`20240131-235959`) embedded in run directory names. */
function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}-${iso.slice(11, 19).replace(/:/g, "")}`;
}

/**
 * Creates a fresh directory `<baseDir>/<prefix>_<timestamp>_<random>`.
 *
 * Creation goes through `mkdtemp`, which picks the random suffix and creates
 * the directory in one exclusive step, so concurrent callers never receive
 * the same path.
 *
 * @throws {AllocationError} When {@link baseDir} is missing, not a directory or not writable.
 */
export async function allocateRunDirectory(
  baseDir: string,
  prefix: string,
  now: () => Date = () => new Date(),
): Promise<string> {
  const absoluteBase = path.resolve(baseDir);

  try {
    const stats = await stat(absoluteBase);
    if (!stats.isDirectory()) {
      throw new AllocationError(`base directory ${absoluteBase} is not a directory`, { baseDir: absoluteBase });
    }
    await access(absoluteBase, fsConstants.W_OK);
  } catch (error) {
    if (error instanceof AllocationError) {
      throw error;
    }
    throw new AllocationError(
      `base directory ${absoluteBase} is not usable: ${error instanceof Error ? error.message : String(error)}`,
      { baseDir: absoluteBase },
      error,
    );
  }

  const template = path.join(absoluteBase, `${sanitizeFilename(prefix)}_${formatTimestamp(now())}_`);
  try {
    return await mkdtemp(template);
  } catch (error) {
    throw new AllocationError(
      `could not create a run directory under ${absoluteBase}`,
      { baseDir: absoluteBase },
      error,
    );
  }
}
