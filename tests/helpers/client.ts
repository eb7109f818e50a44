import { IpSonarClientWithResponses } from '../../src/client/ip-sonar-with-responses.ts'
import { IpSonarClient } from '../../src/client/ip-sonar.ts'
import { withHttpClient, type TClientOption } from '../../src/core/options.ts'
import { TEST_CONFIG } from './constants.ts'
import type { THttpClientMock } from './mocks/http-client.mock.ts'

/**
 * Creates a raw client wired to the mock transport.
 * Extra options are applied after the mock, so they can override it.
 */
export function createTestClient(mock: THttpClientMock, ...options: TClientOption[]): IpSonarClient {
  return new IpSonarClient(TEST_CONFIG.server, withHttpClient(mock.httpClient), ...options)
}

/** Creates a response-parsing client wired to the mock transport. */
export function createTestClientWithResponses(
  mock: THttpClientMock,
  ...options: TClientOption[]
): IpSonarClientWithResponses {
  return new IpSonarClientWithResponses(
    TEST_CONFIG.server,
    withHttpClient(mock.httpClient),
    ...options,
  )
}
