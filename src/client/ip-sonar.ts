import { applyClientOptions, type TClientOption } from '../core/options.ts'
import type { TCallOptions, THttpClient, TRequestEditorFn } from '../core/types.ts'
import {
  buildBatchLookupRequest,
  buildBatchLookupRequestWithBody,
  buildLookupMyRequest,
  buildLookupRequest,
  type TRequestBody,
} from '../domains/geolocation/geolocation.requests.ts'
import {
  API_SERVER,
  type TBatchLookupParams,
  type TBatchLookupRequestBody,
  type TLookupMyParams,
  type TLookupParams,
} from '../types/api.ts'

/**
 * Low-level IP Sonar client. Builds requests, runs request editors and returns
 * the raw Response; the caller owns (and must consume) the response body.
 *
 * Non-2xx statuses are not errors here. Only transport failures and errors
 * thrown by request editors reject.
 *
 * @example
 * ```typescript
 * const client = new IpSonarClient(API_SERVER, withApiKey('your-api-key'))
 *
 * const response = await client.lookup('192.168.1.1', { fields: 'ip,country_code' })
 * const body = await response.json()
 * ```
 */
export class IpSonarClient {
  /** Effective server URL, always ending with "/" */
  public readonly server: string
  private httpClient: THttpClient
  private requestEditors: TRequestEditorFn[]

  constructor(server: string = API_SERVER, ...options: TClientOption[]) {
    const config = applyClientOptions(server, options)
    this.server = config.server
    this.httpClient = config.httpClient
    this.requestEditors = config.requestEditors
  }

  /** Geolocation of a single address. */
  public async lookup(
    ip: string,
    params?: TLookupParams,
    options?: TCallOptions,
  ): Promise<Response> {
    const request: Request = buildLookupRequest(this.server, ip, params, options?.signal)
    return await this.dispatch(request, options)
  }

  /** Geolocation of the caller's own address, as seen by the server. */
  public async lookupMy(params?: TLookupMyParams, options?: TCallOptions): Promise<Response> {
    const request: Request = buildLookupMyRequest(this.server, params, options?.signal)
    return await this.dispatch(request, options)
  }

  /** Geolocation of several addresses in one request. */
  public async batchLookup(
    params: TBatchLookupParams | undefined,
    body: TBatchLookupRequestBody,
    options?: TCallOptions,
  ): Promise<Response> {
    const request: Request = buildBatchLookupRequest(this.server, params, body, options?.signal)
    return await this.dispatch(request, options)
  }

  /** Batch lookup with a body that is already serialized. */
  public async batchLookupWithBody(
    params: TBatchLookupParams | undefined,
    contentType: string,
    body: TRequestBody,
    options?: TCallOptions,
  ): Promise<Response> {
    const request: Request = buildBatchLookupRequestWithBody(
      this.server,
      params,
      contentType,
      body,
      options?.signal,
    )
    return await this.dispatch(request, options)
  }

  private async dispatch(request: Request, options?: TCallOptions): Promise<Response> {
    const editedRequest: Request = await this.applyEditors(request, options)
    return await this.httpClient.send(editedRequest)
  }

  private async applyEditors(request: Request, options?: TCallOptions): Promise<Request> {
    const editors: TRequestEditorFn[] = [...this.requestEditors, ...(options?.requestEditors ?? [])]
    let current: Request = request
    for (const editor of editors) {
      const replacement: void | Request = await editor(current, options?.signal)
      if (replacement instanceof Request) current = replacement
    }
    return current
  }
}
