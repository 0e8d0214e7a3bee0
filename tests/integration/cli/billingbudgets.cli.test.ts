import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { CloudBillingBudgetScope } from '../../../src/apis/billingbudgets/scopes.ts'
import { billingBudgetsCli } from '../../../src/cli/definitions/billingbudgets.ts'
import { EXIT_FAILURE, EXIT_INVALID_OPTIONS, EXIT_SUCCESS, runCli } from '../../../src/cli/engine.ts'
import { createTestIo, type TTestIo } from '../../helpers/cli.ts'
import { TEST_CONFIG } from '../../helpers/constants.ts'
import { makeServerError } from '../../helpers/factories.ts'
import { createFetchMock, headerOf } from '../../helpers/mocks/fetch.mock.ts'

const BASE = 'https://billingbudgets.googleapis.com/'
const BUDGET = `${TEST_CONFIG.billingAccount}/budgets/b1`

describe('billingbudgets1-beta1', () => {
  let testIo: TTestIo | undefined

  afterEach(async () => {
    await testIo?.cleanup()
    testIo = undefined
  })

  it('creates a budget from -r fields and prints the response without nulls', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ name: BUDGET, displayName: 'Q3', addedLater: null })
    testIo = await createTestIo(fetchMock)

    const code = await runCli(
      billingBudgetsCli,
      [
        'billing-accounts',
        'budgets-create',
        TEST_CONFIG.billingAccount,
        '-r',
        'budget.display-name=Q3',
        '-r',
        'budget.amount.specified-amount',
        '-r',
        'currency-code=USD',
        '-r',
        'units=1000',
      ],
      testIo.io,
    )

    expect(code).toBe(EXIT_SUCCESS)
    expect(testIo.stderr()).toBe('')
    expect(fetchMock.calls[0].url).toBe(`${BASE}v1beta1/billingAccounts/000000-000000-000000/budgets?alt=json`)
    expect(fetchMock.calls[0].init?.method).toBe('POST')
    expect(headerOf(fetchMock.calls[0], 'authorization')).toBe(`Bearer ${TEST_CONFIG.accessToken}`)
    expect(JSON.parse(String(fetchMock.calls[0].init?.body))).toEqual({
      budget: { displayName: 'Q3', amount: { specifiedAmount: { currencyCode: 'USD', units: '1000' } } },
    })
    expect(testIo.stdout()).toBe(`{\n  "displayName": "Q3",\n  "name": "${BUDGET}"\n}\n`)
  })

  it('maps -p names to their wire names', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ name: BUDGET })
    testIo = await createTestIo(fetchMock)

    const code = await runCli(
      billingBudgetsCli,
      ['billing-accounts', 'budgets-get', BUDGET, '-p', 'fields=name', '-p', 'quota-user=me'],
      testIo.io,
    )

    expect(code).toBe(EXIT_SUCCESS)
    expect(fetchMock.calls[0].url).toBe(`${BASE}v1beta1/${BUDGET}?fields=name&quotaUser=me&alt=json`)
  })

  it('reports every invalid option before any request and exits with 2', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock)

    const code = await runCli(
      billingBudgetsCli,
      [
        'billing-accounts',
        'budgets-create',
        TEST_CONFIG.billingAccount,
        '-r',
        'budget.display-nam=Q3',
        '-p',
        'quota-usr=me',
      ],
      testIo.io,
    )

    expect(code).toBe(EXIT_INVALID_OPTIONS)
    expect(testIo.stderr()).toBe(
      "Field 'budget.display-nam' does not exist, did you mean 'budget.display-name'?\n" +
        "Parameter 'quota-usr' is unknown, did you mean 'quota-user'?\n",
    )
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('reports query values that fail validation as invalid options', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock)

    const code = await runCli(
      billingBudgetsCli,
      ['billing-accounts', 'budgets-list', TEST_CONFIG.billingAccount, '-p', 'page-size=500'],
      testIo.io,
    )

    expect(code).toBe(EXIT_INVALID_OPTIONS)
    expect(testIo.stderr()).toBe('pageSize: Number must be less than or equal to 100\n')
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('reports a parameter without a value', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock)

    const code = await runCli(billingBudgetsCli, ['billing-accounts', 'budgets-get', BUDGET, '-p', 'fields'], testIo.io)

    expect(code).toBe(EXIT_INVALID_OPTIONS)
    expect(testIo.stderr()).toBe("Parameter 'fields' must be given as key=value\n")
  })

  it('exits with 2 when a path argument is missing', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock)

    const code = await runCli(billingBudgetsCli, ['billing-accounts', 'budgets-get'], testIo.io)

    expect(code).toBe(EXIT_INVALID_OPTIONS)
    expect(testIo.stderr()).toContain("missing required argument 'name'")
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('prints the server message and exits with 1 on an API error', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson(makeServerError(404, 'Budget not found', 'NOT_FOUND'), { status: 404 })
    testIo = await createTestIo(fetchMock)

    const code = await runCli(billingBudgetsCli, ['billing-accounts', 'budgets-get', BUDGET], testIo.io)

    expect(code).toBe(EXIT_FAILURE)
    expect(testIo.stderr()).toBe('HTTP 404: Budget not found\n')
    expect(testIo.stdout()).toBe('')
  })

  it('prints the full error with --debug', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson(makeServerError(404, 'Budget not found', 'NOT_FOUND'), { status: 404 })
    testIo = await createTestIo(fetchMock)

    const code = await runCli(billingBudgetsCli, ['--debug', 'billing-accounts', 'budgets-get', BUDGET], testIo.io)

    expect(code).toBe(EXIT_FAILURE)
    expect(testIo.stderr()).toContain('BadRequestError: HTTP 404: Budget not found')
    expect(testIo.stderr()).toContain("status: 'NOT_FOUND'")
  })

  it('writes the response to the -o file', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ name: BUDGET })
    testIo = await createTestIo(fetchMock)
    const out = join(testIo.io.cwd, 'budget.json')

    const code = await runCli(billingBudgetsCli, ['billing-accounts', 'budgets-get', BUDGET, '-o', out], testIo.io)

    expect(code).toBe(EXIT_SUCCESS)
    expect(await readFile(out, 'utf8')).toBe(`{\n  "name": "${BUDGET}"\n}\n`)
    expect(testIo.stdout()).toBe('')
  })

  it('exits with 1 when the -o file cannot be written', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ name: BUDGET })
    testIo = await createTestIo(fetchMock)
    const out = join(testIo.io.cwd, 'missing', 'budget.json')

    const code = await runCli(billingBudgetsCli, ['billing-accounts', 'budgets-get', BUDGET, '-o', out], testIo.io)

    expect(code).toBe(EXIT_FAILURE)
    expect(testIo.stderr()).toContain(`Failed to open output file '${out}': ENOENT`)
  })

  it('requests a refresh-token grant for the method and --scope scopes', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ access_token: 'refreshed-token', expires_in: 3600 })
    fetchMock.pushJson({ name: BUDGET })
    testIo = await createTestIo(fetchMock, {
      GOOGLE_OAUTH_CLIENT_ID: TEST_CONFIG.clientId,
      GOOGLE_OAUTH_CLIENT_SECRET: TEST_CONFIG.clientSecret,
      GOOGLE_OAUTH_REFRESH_TOKEN: TEST_CONFIG.refreshToken,
    })

    const code = await runCli(
      billingBudgetsCli,
      ['--scope', CloudBillingBudgetScope.CloudBilling, 'billing-accounts', 'budgets-get', BUDGET],
      testIo.io,
    )

    expect(code).toBe(EXIT_SUCCESS)
    expect(fetchMock.calls[0].url).toBe('https://oauth2.googleapis.com/token')
    expect(new URLSearchParams(String(fetchMock.calls[0].init?.body)).get('scope')).toBe(
      CloudBillingBudgetScope.CloudBilling,
    )
    expect(headerOf(fetchMock.calls[1], 'authorization')).toBe('Bearer refreshed-token')
  })

  it('exits with 2 on invalid configuration', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock, { GOOGLE_OAUTH_CLIENT_ID: TEST_CONFIG.clientId })

    const code = await runCli(billingBudgetsCli, ['billing-accounts', 'budgets-get', BUDGET], testIo.io)

    expect(code).toBe(EXIT_INVALID_OPTIONS)
    expect(testIo.stderr()).toContain('must be set together')
  })
})
