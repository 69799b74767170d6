/**
 * Library entry: playlist resolution and the fetch-and-stitch pipeline.
 */
export * from "./playlist/index.js";
export * from "./downloader/index.js";
export {
  errorMessage,
  isPipelineError,
  PipelineError,
  type ErrorResult,
  type PipelineErrorCode,
  type PipelineErrorContext,
} from "./shared/errors.js";
export type { PipelineEvent, PipelineEventHandler, PipelineEventType } from "./shared/events.js";
export {
  createTransport,
  type Transport,
  type TransportOptions,
  type TransportResponse,
} from "./shared/http.js";
export { deriveOutputName } from "./shared/slug.js";
export { isPlaylistUrl, resolveUrl } from "./shared/url.js";
