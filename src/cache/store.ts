import { mkdir, open, readFile, rename, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";
import { isRecord } from "../core/guards.js";

/** Where the durable cache tier keeps its single serialized envelope. */
export interface CacheStore {
  /** Stored text, or null when nothing has been written. */
  read(): Promise<string | null>;
  write(contents: string): Promise<void>;
  remove(): Promise<void>;
}

function isMissing(e: unknown): boolean {
  return isRecord(e) && e.code === "ENOENT";
}

export class FileCacheStore implements CacheStore {
  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async read(): Promise<string | null> {
    try {
      return await readFile(this.path, "utf8");
    } catch (e) {
      if (isMissing(e)) return null;
      throw e;
    }
  }

  /** Temp file, fsync, rename: readers see the old envelope or the new one. */
  async write(contents: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp.${process.pid}.${Date.now()}`;

    let fh: FileHandle | null = null;
    try {
      fh = await open(tmp, "w");
      await fh.writeFile(contents, "utf8");
      await fh.sync();
      await fh.close();
      fh = null;

      await rename(tmp, this.path);
    } catch (e) {
      try {
        if (fh) await fh.close();
        await unlink(tmp);
      } catch (cleanup) {
        this.logger.warn(`Could not remove ${tmp}: ${errorMessage(cleanup)}`);
      }
      throw e;
    }
  }

  async remove(): Promise<void> {
    try {
      await unlink(this.path);
    } catch (e) {
      if (!isMissing(e)) throw e;
    }
  }
}

export class MemoryCacheStore implements CacheStore {
  contents: string | null = null;
  writes = 0;

  async read(): Promise<string | null> {
    return this.contents;
  }

  async write(contents: string): Promise<void> {
    this.writes++;
    this.contents = contents;
  }

  async remove(): Promise<void> {
    this.contents = null;
  }
}
