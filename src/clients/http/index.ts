/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRequestFn,
  HttpResponse,
  HttpRedirectMode,
} from "@/types";
