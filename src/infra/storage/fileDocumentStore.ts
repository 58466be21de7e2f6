import { mkdir, readdir, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { ArchivedFile } from "../../core/entities/document";
import type {
  ArchiveInventoryPort,
  DocumentStorePort,
} from "../../core/ports/outboundPorts";

const PROVIDER = "file-store";

const ioError = (error: unknown, fallback: string): AppBoundaryError => ({
  source: "storage",
  code: "io_error",
  provider: PROVIDER,
  message: error instanceof Error ? error.message : fallback,
  retryable: false,
  cause: error,
});

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Persists archive files verbatim under one root directory, creating parents as needed.
 */
export class FileDocumentStore implements DocumentStorePort, ArchiveInventoryPort {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async save(
    relativePath: string,
    body: Uint8Array,
  ): Promise<Result<string, AppBoundaryError>> {
    const target = this.insideRoot(relativePath);
    if (target.isErr()) {
      return err(target.error);
    }

    try {
      await mkdir(path.dirname(target.value), { recursive: true });
      await writeFile(target.value, body);
      return ok(target.value);
    } catch (error) {
      return err(ioError(error, "File write failed."));
    }
  }

  async list(directory: string): Promise<Result<ArchivedFile[], AppBoundaryError>> {
    const target = this.insideRoot(directory);
    if (target.isErr()) {
      return err(target.error);
    }

    try {
      const entries = await readdir(target.value, { withFileTypes: true });
      const files = await Promise.all(
        entries
          .filter((entry) => entry.isFile())
          .map(async (entry): Promise<ArchivedFile> => {
            const info = await stat(path.join(target.value, entry.name));
            return { name: entry.name, sizeBytes: info.size, modifiedAt: info.mtime };
          }),
      );
      return ok(files.sort((left, right) => left.name.localeCompare(right.name)));
    } catch (error) {
      if (isMissing(error)) {
        return ok([]);
      }
      return err(ioError(error, "Directory listing failed."));
    }
  }

  async clear(directory: string): Promise<Result<number, AppBoundaryError>> {
    const listed = await this.list(directory);
    if (listed.isErr()) {
      return err(listed.error);
    }

    const target = path.resolve(this.root, directory);
    try {
      for (const file of listed.value) {
        await rm(path.join(target, file.name), { force: true });
      }
      return ok(listed.value.length);
    } catch (error) {
      return err(ioError(error, "File removal failed."));
    }
  }

  private insideRoot(relativePath: string): Result<string, AppBoundaryError> {
    const target = path.resolve(this.root, relativePath);
    if (!target.startsWith(`${this.root}${path.sep}`)) {
      return err({
        source: "storage",
        code: "validation_error",
        provider: PROVIDER,
        message: `Refusing to touch a path outside the archive root: ${relativePath}`,
        retryable: false,
      });
    }
    return ok(target);
  }
}
