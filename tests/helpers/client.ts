import { vi } from 'vitest'
import { CloudBillingBudget } from '../../src/apis/billingbudgets/billingbudgets.hub.ts'
import { ChromeManagement } from '../../src/apis/chromemanagement/chromemanagement.hub.ts'
import { CustomSearch } from '../../src/apis/customsearch/customsearch.hub.ts'
import type { THubOptions } from '../../src/core/hub.ts'
import type { TTokenProvider } from '../../src/core/types.ts'
import { TEST_CONFIG } from './constants.ts'
import type { TFetchMock } from './mocks/fetch.mock.ts'

export type TMockTokenProvider = TTokenProvider & {
  getToken: ReturnType<typeof createGetTokenMock>
}

function createGetTokenMock(token: string | undefined) {
  return vi.fn(
    async (_scopes: readonly string[], _signal?: AbortSignal): Promise<string | undefined> => token,
  )
}

export function createMockTokenProvider(token: string | undefined = TEST_CONFIG.accessToken): TMockTokenProvider {
  return { getToken: createGetTokenMock(token) }
}

/**
 * Hub options with test defaults: a mock token provider and the given fetch mock.
 * All options can be overridden.
 */
export function testHubOptions(fetchMock: TFetchMock, overrides?: Partial<THubOptions>): THubOptions {
  return {
    tokenProvider: createMockTokenProvider(),
    fetchImplementation: fetchMock.fetch,
    ...overrides,
  }
}

export function createTestChromeManagement(fetchMock: TFetchMock, overrides?: Partial<THubOptions>) {
  return new ChromeManagement(testHubOptions(fetchMock, overrides))
}

export function createTestCustomSearch(fetchMock: TFetchMock, overrides?: Partial<THubOptions>) {
  return new CustomSearch(testHubOptions(fetchMock, { apiKey: TEST_CONFIG.apiKey, ...overrides }))
}

export function createTestBillingBudget(fetchMock: TFetchMock, overrides?: Partial<THubOptions>) {
  return new CloudBillingBudget(testHubOptions(fetchMock, overrides))
}
