// Clients
export { IpSonarClient } from './client/ip-sonar.ts'
export { IpSonarClientWithResponses } from './client/ip-sonar-with-responses.ts'

// Configuration options
export {
  withApiKey,
  withBaseUrl,
  withFetch,
  withHttpClient,
  withRequestEditorFn,
} from './core/options.ts'
export type { TClientConfig, TClientOption } from './core/options.ts'

// Transport
export { FetchHttpClient } from './core/transport.ts'
export type { TFetchHttpClientOptions } from './core/transport.ts'

// Request builders and response parsers
export {
  buildBatchLookupRequest,
  buildBatchLookupRequestWithBody,
  buildLookupMyRequest,
  buildLookupRequest,
} from './domains/geolocation/geolocation.requests.ts'
export type { TRequestBody } from './domains/geolocation/geolocation.requests.ts'
export {
  parseBatchLookupResponse,
  parseLookupMyResponse,
  parseLookupResponse,
} from './domains/geolocation/geolocation.responses.ts'
export type {
  TBatchLookupResponse,
  TLookupMyResponse,
  TLookupResponse,
  TRawResponse,
} from './domains/geolocation/geolocation.responses.ts'

// Errors
export { ConfigurationError, ResponseDecodeError } from './core/errors.ts'

// Constants and types
export { API_KEY_HEADER, API_SERVER } from './types/api.ts'
export type {
  TBatchLookupIPResponse,
  TBatchLookupParams,
  TBatchLookupRequestBody,
  TErrorResponse,
  TIPGeolocation,
  TLookupMyParams,
  TLookupParams,
} from './types/api.ts'
export type { TCallOptions, THttpClient, THttpMethod, TRequestEditorFn } from './core/types.ts'
