import { readdir, readFile, stat } from "node:fs/promises";
import { basename, extname, join, relative, sep } from "node:path";
import type { LocalFile } from "./types.js";
import { errorMessage, MissingFilesError, NoDocumentsError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

export interface LocalFileClientConfig {
  directory: string;
  extensions: string[];
  logger?: Logger;
}

export class LocalFileClient {
  private readonly directory: string;
  private readonly extensions: Set<string>;
  private readonly logger: Logger;

  constructor(config: LocalFileClientConfig) {
    this.directory = config.directory;
    this.extensions = new Set(
      config.extensions.map((e) => (e.startsWith(".") ? e : `.${e}`).toLowerCase()),
    );
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Recursively scan the directory and yield matching files in name order.
   * A missing root directory is an error, and so is a scan that finds nothing;
   * unreadable files are logged and skipped.
   */
  async *getAllFiles(): AsyncGenerator<LocalFile> {
    let found = 0;
    for await (const file of this.scanDirectory(this.directory)) {
      found++;
      yield file;
    }
    if (found === 0) {
      const error = new NoDocumentsError(this.directory, [...this.extensions]);
      this.logger.error("No documents to ingest", { directory: this.directory });
      throw error;
    }
  }

  /**
   * Yield the named files, given relative to the directory, in the order given.
   * Every name is checked before the first file is read.
   */
  async *getFiles(relativePaths: readonly string[]): AsyncGenerator<LocalFile> {
    const missing: string[] = [];
    for (const relativePath of relativePaths) {
      const found = await stat(join(this.directory, relativePath)).then(
        (s) => s.isFile(),
        () => false,
      );
      if (!found) missing.push(relativePath);
    }
    if (missing.length > 0) {
      const error = new MissingFilesError(this.directory, missing);
      this.logger.error("Requested files not found", { directory: this.directory, missing });
      throw error;
    }

    for (const relativePath of relativePaths) {
      const file = await this.readLocalFile(join(this.directory, relativePath));
      if (file) yield file;
    }
  }

  private async *scanDirectory(dir: string): AsyncGenerator<LocalFile> {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        yield* this.scanDirectory(fullPath);
        continue;
      }
      if (!entry.isFile()) continue;
      if (!this.extensions.has(extname(entry.name).toLowerCase())) continue;

      const file = await this.readLocalFile(fullPath);
      if (file) yield file;
    }
  }

  private async readLocalFile(fullPath: string): Promise<LocalFile | undefined> {
    try {
      const [content, fileStat] = await Promise.all([
        readFile(fullPath, "utf-8"),
        stat(fullPath),
      ]);
      return {
        filePath: fullPath,
        relativePath: relative(this.directory, fullPath).split(sep).join("/"),
        fileName: basename(fullPath),
        extension: extname(fullPath).toLowerCase(),
        content,
        modifiedAt: fileStat.mtime,
      };
    } catch (error) {
      this.logger.warn("Skipping unreadable file", {
        filePath: fullPath,
        error: errorMessage(error),
      });
      return undefined;
    }
  }
}
