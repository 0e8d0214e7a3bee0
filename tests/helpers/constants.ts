/**
 * Shared test constants for unit and integration tests.
 * Use these defaults across all tests for consistency.
 */
export const TEST_CONFIG = {
  accessToken: 'test-access-token',
  apiKey: 'test-api-key',
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  refreshToken: 'test-refresh-token',
  customer: 'customers/my_customer',
  billingAccount: 'billingAccounts/000000-000000-000000',
} as const

export type TTestConfig = typeof TEST_CONFIG
