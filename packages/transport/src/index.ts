// Types
export {
  type HeaderMap,
  type ReadonlyHeaderMap,
  type TransportRequest,
  type TransportResponse,
  type HttpTransport,
} from './types.js';

// Headers
export {
  normalizeHeaderName,
  createHeaderMap,
  appendHeader,
  mergeHeaders,
  hasHeader,
  toFetchHeaders,
  fromFetchHeaders,
} from './headers.js';

// Bodies
export { emptyBody, bodyFromChunks, readWebStream, drainBody, decodeBody } from './body.js';

// Fetch transport
export {
  type FetchFunction,
  type FetchTransportConfig,
  fetchTransportConfigSchema,
  createFetchTransport,
  defaultTransport,
} from './fetch.js';
