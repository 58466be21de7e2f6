import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
} from "../../core/entities/appError";
import type { HttpClientError } from "./httpClient";

const mapHttpCode = (failure: HttpClientError): AppBoundaryErrorCode => {
  if (failure.code === "timeout") {
    return "timeout";
  }

  if (failure.code === "transport_error") {
    return "transport_error";
  }

  switch (failure.httpStatus) {
    case 401:
    case 403:
      return "auth_invalid";
    case 404:
      return "not_found";
    case 429:
      return "rate_limited";
    default:
      return "provider_error";
  }
};

/**
 * Lifts transport failures into boundary errors so services never see HTTP-specific shapes.
 */
export const toBoundaryError = (
  source: AppBoundaryError["source"],
  provider: string,
  failure: HttpClientError,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(failure),
  provider,
  message: failure.message,
  retryable: failure.retryable,
  httpStatus: failure.httpStatus,
  cause: failure.cause,
});
