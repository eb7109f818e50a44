import type { TClientOption } from '../core/options.ts'
import type { TCallOptions } from '../core/types.ts'
import type { TRequestBody } from '../domains/geolocation/geolocation.requests.ts'
import {
  parseBatchLookupResponse,
  parseLookupMyResponse,
  parseLookupResponse,
  type TBatchLookupResponse,
  type TLookupMyResponse,
  type TLookupResponse,
} from '../domains/geolocation/geolocation.responses.ts'
import {
  API_SERVER,
  type TBatchLookupParams,
  type TBatchLookupRequestBody,
  type TLookupMyParams,
  type TLookupParams,
} from '../types/api.ts'
import { IpSonarClient } from './ip-sonar.ts'

/**
 * Wraps IpSonarClient and decodes each response into status-keyed fields
 * (`json200`, `json401`, ...). Which statuses are decoded differs per operation.
 *
 * @example
 * ```typescript
 * const client = new IpSonarClientWithResponses(API_SERVER, withApiKey('your-api-key'))
 *
 * const response = await client.lookupMyWithResponse()
 * if (response.json200) console.log(response.json200.country_code)
 * ```
 */
export class IpSonarClientWithResponses {
  public readonly client: IpSonarClient

  constructor(server: string = API_SERVER, ...options: TClientOption[]) {
    this.client = new IpSonarClient(server, ...options)
  }

  public async lookupWithResponse(
    ip: string,
    params?: TLookupParams,
    options?: TCallOptions,
  ): Promise<TLookupResponse> {
    return await parseLookupResponse(await this.client.lookup(ip, params, options))
  }

  public async lookupMyWithResponse(
    params?: TLookupMyParams,
    options?: TCallOptions,
  ): Promise<TLookupMyResponse> {
    return await parseLookupMyResponse(await this.client.lookupMy(params, options))
  }

  public async batchLookupWithResponse(
    params: TBatchLookupParams | undefined,
    body: TBatchLookupRequestBody,
    options?: TCallOptions,
  ): Promise<TBatchLookupResponse> {
    return await parseBatchLookupResponse(await this.client.batchLookup(params, body, options))
  }

  public async batchLookupWithBodyWithResponse(
    params: TBatchLookupParams | undefined,
    contentType: string,
    body: TRequestBody,
    options?: TCallOptions,
  ): Promise<TBatchLookupResponse> {
    return await parseBatchLookupResponse(
      await this.client.batchLookupWithBody(params, contentType, body, options),
    )
  }
}
