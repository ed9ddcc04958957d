import { createReadStream } from "node:fs";
import { link, lstat, mkdir, open, realpath, symlink, unlink } from "node:fs/promises";
import path from "node:path";
import type { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import tar from "tar-stream";

import { ExtractionError, PathTraversalError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError, isErrnoException } from "../nodePrimitives.js";
import { canonicalizePath, isWithinDirectory } from "../paths.js";

/** Compression detected from the leading bytes of an archive. */
export type ArchiveEncoding = "gzip" | "tar" | "bzip2" | "xz" | "zstd" | "empty";

const DEFAULT_FILE_MODE = 0o644;
const DEFAULT_DIRECTORY_MODE = 0o755;

/** Only permission bits are restored; setuid/setgid/sticky bits are dropped. */
const PERMISSION_MASK = 0o777;

/**
 * Identifies the archive encoding from its magic bytes. The file name is never
 * consulted: conda-pack and poncho both emit `.tar.gz` names for archives that
 * may be compressed differently.
 */
export function detectArchiveEncoding(head: Uint8Array): ArchiveEncoding {
  if (head.length === 0) {
    return "empty";
  }
  if (head[0] === 0x1f && head[1] === 0x8b) {
    return "gzip";
  }
  if (head[0] === 0x42 && head[1] === 0x5a && head[2] === 0x68) {
    return "bzip2";
  }
  if (head[0] === 0xfd && head[1] === 0x37 && head[2] === 0x7a && head[3] === 0x58 && head[4] === 0x5a && head[5] === 0x00) {
    return "xz";
  }
  if (head[0] === 0x28 && head[1] === 0xb5 && head[2] === 0x2f && head[3] === 0xfd) {
    return "zstd";
  }
  return "tar";
}

async function readArchiveHead(archivePath: string): Promise<Uint8Array> {
  const handle = await open(archivePath, "r");
  try {
    const buffer = new Uint8Array(8);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/** Copies an entry body chunk by chunk; entry streams are streamx readables, not Node ones. */
async function writeEntryBody(stream: Readable, target: string, mode: number): Promise<void> {
  const handle = await open(target, "w", mode);
  try {
    for await (const chunk of stream) {
      const data: Uint8Array = chunk;
      await handle.write(data);
    }
    // `open` applies the umask; restore the recorded bits exactly.
    await handle.chmod(mode);
  } finally {
    await handle.close();
  }
}

export interface SafeArchiveExtractorOptions {
  readonly logger?: StructuredLogger;
}

/** Member header fields the extractor relies on. */
interface MemberHeader {
  name: string;
  type?: string | null;
  linkname?: string | null;
  mode?: number | null;
}

/**
 * Extracts tar archives (optionally gzip-compressed) while refusing any member
 * that would land outside of the destination directory.
 *
 * Every member is resolved against the directory tree as it exists on disk at
 * that moment, symlinks created by earlier members included, and the check
 * runs before the member's first byte is written.
 */
export class SafeArchiveExtractor {
  private readonly logger: StructuredLogger | undefined;

  constructor(options: SafeArchiveExtractorOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * @throws {PathTraversalError} When a member escapes {@link destDir}. Members
   * processed before the offending one stay on disk.
   * @throws {ExtractionError} When the archive cannot be read or written.
   */
  async extract(archivePath: string, destDir: string): Promise<void> {
    let root: string;
    let head: Uint8Array;
    try {
      await mkdir(destDir, { recursive: true });
      root = await realpath(destDir);
      head = await readArchiveHead(archivePath);
    } catch (error) {
      throw new ExtractionError(
        `cannot open ${archivePath} for extraction: ${describeError(error)}`,
        { archivePath, destDir },
        error,
      );
    }

    const encoding = detectArchiveEncoding(head);
    if (encoding === "empty") {
      throw new ExtractionError(`archive ${archivePath} is empty`, { archivePath, encoding });
    }
    if (encoding !== "gzip" && encoding !== "tar") {
      throw new ExtractionError(`unsupported archive compression: ${encoding}`, { archivePath, encoding });
    }

    this.logger?.info("archive_extract_started", { archive: archivePath, dest: root, encoding });

    const extract = tar.extract();
    let members = 0;
    extract.on("entry", (header: MemberHeader, stream: Readable, next: () => void) => {
      this.writeMember(root, header, stream).then(
        () => {
          members += 1;
          next();
        },
        (error: unknown) => {
          stream.resume();
          extract.destroy(error instanceof Error ? error : new Error(String(error)));
        },
      );
    });

    const stages: Array<Readable | Transform> = [createReadStream(archivePath)];
    if (encoding === "gzip") {
      stages.push(createGunzip());
    }

    try {
      await pipeline([...stages, extract]);
    } catch (error) {
      if (error instanceof PathTraversalError) {
        this.logger?.error("archive_member_rejected", error.toLogPayload());
        throw error;
      }
      throw new ExtractionError(
        `failed to extract ${archivePath}: ${describeError(error)}`,
        { archivePath, destDir: root, membersExtracted: members },
        error,
      );
    }

    this.logger?.info("archive_extract_completed", { archive: archivePath, dest: root, members });
  }

  private async writeMember(root: string, header: MemberHeader, stream: Readable): Promise<void> {
    const name = header.name.replace(/\/+$/, "");
    if (path.isAbsolute(name) || /^[A-Za-z]:[\\/]/.test(name)) {
      throw new PathTraversalError(`archive member ${header.name} has an absolute path`, name, root, {
        member: header.name,
      });
    }

    const target = await this.checkedPath(root, path.resolve(root, name), header.name);
    if (target === root) {
      // `./` or an empty name designates the destination itself.
      stream.resume();
      return;
    }

    const type = header.type ?? "file";
    switch (type) {
      case "directory":
        stream.resume();
        await mkdir(target, { recursive: true, mode: this.modeOf(header, DEFAULT_DIRECTORY_MODE) });
        return;
      case "file":
      case "contiguous-file":
        await mkdir(path.dirname(target), { recursive: true });
        await this.removeSymlink(target);
        await writeEntryBody(stream, target, this.modeOf(header, DEFAULT_FILE_MODE));
        return;
      case "symlink": {
        stream.resume();
        const linkname = header.linkname ?? "";
        // The link target is resolved as the kernel will read it: relative to
        // the directory holding the link, `..` applied after earlier links.
        const linkPath = path.isAbsolute(linkname) ? linkname : `${path.dirname(target)}${path.sep}${linkname}`;
        await this.checkedPath(root, linkPath, header.name, linkname);
        await mkdir(path.dirname(target), { recursive: true });
        await this.removeSymlink(target);
        await symlink(linkname, target);
        return;
      }
      case "link": {
        stream.resume();
        const linkname = header.linkname ?? "";
        if (path.isAbsolute(linkname)) {
          throw new PathTraversalError(`hard link ${header.name} targets an absolute path`, linkname, root, {
            member: header.name,
            linkname,
          });
        }
        // Hard link sources are named relative to the archive root.
        const source = await this.checkedPath(root, path.resolve(root, linkname), header.name, linkname);
        await mkdir(path.dirname(target), { recursive: true });
        await this.removeSymlink(target);
        await link(source, target);
        return;
      }
      default:
        this.logger?.debug("archive_member_skipped", { member: header.name, type });
        stream.resume();
        return;
    }
  }

  /**
   * Canonicalises {@link candidate} and ensures it stays inside {@link root}.
   * Returns the lexical (not canonical) path so the member is created where
   * the archive names it.
   */
  private async checkedPath(root: string, candidate: string, member: string, linkname?: string): Promise<string> {
    const canonical = await canonicalizePath(candidate);
    if (!isWithinDirectory(root, canonical)) {
      throw new PathTraversalError(
        linkname === undefined
          ? `archive member ${member} resolves outside of ${root}`
          : `archive member ${member} links to ${linkname}, outside of ${root}`,
        canonical,
        root,
        linkname === undefined ? { member } : { member, linkname },
      );
    }
    return candidate;
  }

  /** A member replaces a symlink at its own path instead of writing through it. */
  private async removeSymlink(target: string): Promise<void> {
    try {
      const stats = await lstat(target);
      if (stats.isSymbolicLink()) {
        await unlink(target);
      }
    } catch (error) {
      if (!isErrnoException(error, "ENOENT")) {
        throw error;
      }
    }
  }

  private modeOf(header: MemberHeader, fallback: number): number {
    return typeof header.mode === "number" ? header.mode & PERMISSION_MASK : fallback;
  }
}
