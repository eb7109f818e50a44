import type { THttpClient } from './types.ts'
import { resolveFetch } from './utils.ts'

export type TFetchHttpClientOptions = {
  fetchImplementation?: typeof fetch | undefined
}

/**
 * Default transport backed by fetch. Sends the request as-is and hands back the
 * raw response; status codes are left for the caller to interpret.
 */
export class FetchHttpClient implements THttpClient {
  private fetchImplementation: typeof fetch

  constructor(options: TFetchHttpClientOptions = {}) {
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  async send(request: Request): Promise<Response> {
    return await this.fetchImplementation(request)
  }
}
