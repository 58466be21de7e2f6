import { ArchiveService } from "../services/archiveService";
import { DocumentSelectionService } from "../services/documentSelectionService";
import { env } from "../../shared/config/env";
import { HttpClient } from "../../infra/http/httpClient";
import { hostOf } from "../../infra/resolver/bseUrls";
import { DocumentResolver } from "../../infra/resolver/documentResolver";
import { ScreenerCompanyLocator } from "../../infra/providers/screener/screenerCompanyLocator";
import { ScreenerPageFetcher } from "../../infra/providers/screener/screenerPageFetcher";
import { FileDocumentStore } from "../../infra/storage/fileDocumentStore";
import {
  SystemClock,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";

export type RuntimeOverrides = {
  downloadDir?: string;
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 * One HttpClient serves every adapter so the politeness delay spans all hosts.
 */
export const createRuntime = (overrides: RuntimeOverrides = {}) => {
  const httpClient = new HttpClient(env.REQUEST_DELAY_MS);

  const pages = new ScreenerPageFetcher(
    env.BROWSER_USER_AGENT,
    env.HTTP_TIMEOUT_MS,
    httpClient,
  );
  const locator = new ScreenerCompanyLocator(env.SCREENER_BASE_URL, pages);
  const resolver = new DocumentResolver(
    {
      bseBaseUrl: env.BSE_BASE_URL,
      userAgent: env.BROWSER_USER_AGENT,
      alternateUserAgent: env.ALTERNATE_USER_AGENT,
      timeoutMs: env.HTTP_TIMEOUT_MS,
    },
    httpClient,
  );
  const store = new FileDocumentStore(overrides.downloadDir ?? env.DOWNLOAD_DIR);

  const selectionService = new DocumentSelectionService(resolver);
  const archiveService = new ArchiveService(
    locator,
    selectionService,
    store,
    {
      baseUrl: env.SCREENER_BASE_URL,
      secondaryHost: hostOf(env.BSE_BASE_URL),
    },
    new SystemClock(),
    new UuidIdGenerator(),
  );

  return {
    locator,
    archiveService,
    inventory: store,
  };
};
