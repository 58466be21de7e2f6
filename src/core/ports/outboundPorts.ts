import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { ArchivedFile, ResolvedDocument } from "../entities/document";
import type { ProgressEvent } from "../entities/progress";

export interface PageFetcherPort {
  fetchPage(url: string): Promise<Result<string, AppBoundaryError>>;
}

export interface DocumentResolverPort {
  resolve(url: string): Promise<Result<ResolvedDocument, AppBoundaryError>>;
}

export interface DocumentStorePort {
  /**
   * Writes bytes under the archive root and returns the absolute path written.
   */
  save(
    relativePath: string,
    body: Uint8Array,
  ): Promise<Result<string, AppBoundaryError>>;
}

export interface ArchiveInventoryPort {
  /**
   * Files directly under one archive directory, sorted by name. A missing directory is empty.
   */
  list(directory: string): Promise<Result<ArchivedFile[], AppBoundaryError>>;
  /**
   * Deletes the files `list` would return and yields how many were removed.
   */
  clear(directory: string): Promise<Result<number, AppBoundaryError>>;
}

export interface ProgressSinkPort {
  publish(event: ProgressEvent): void;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
