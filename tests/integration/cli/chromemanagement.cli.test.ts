import { afterEach, describe, expect, it } from 'vitest'
import { chromeManagementCli } from '../../../src/cli/definitions/chromemanagement.ts'
import { EXIT_INVALID_OPTIONS, EXIT_SUCCESS, runCli } from '../../../src/cli/engine.ts'
import { SDK_VERSION } from '../../../src/core/sdk-info.ts'
import { createTestIo, type TTestIo } from '../../helpers/cli.ts'
import { TEST_CONFIG } from '../../helpers/constants.ts'
import { createFetchMock } from '../../helpers/mocks/fetch.mock.ts'

describe('chromemanagement1', () => {
  let testIo: TTestIo | undefined

  afterEach(async () => {
    await testIo?.cleanup()
    testIo = undefined
  })

  it('gets an app by its resource name', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ appId: 'com.foo', displayName: 'Foo', isPaidApp: false })
    testIo = await createTestIo(fetchMock)

    const code = await runCli(
      chromeManagementCli,
      ['customers', 'apps-android-get', `${TEST_CONFIG.customer}/apps/android/com.foo`],
      testIo.io,
    )

    expect(code).toBe(EXIT_SUCCESS)
    expect(fetchMock.calls[0].url).toBe(
      'https://chromemanagement.googleapis.com/v1/customers/my_customer/apps/android/com.foo?alt=json',
    )
    expect(testIo.stdout()).toBe('{\n  "appId": "com.foo",\n  "displayName": "Foo",\n  "isPaidApp": false\n}\n')
  })

  it('sets typed report parameters', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ totalSize: 0 })
    testIo = await createTestIo(fetchMock)

    const code = await runCli(
      chromeManagementCli,
      ['customers', 'reports-count-chrome-versions', TEST_CONFIG.customer, '-p', 'page-size=10', '-p', 'org-unit-id=ou1'],
      testIo.io,
    )

    expect(code).toBe(EXIT_SUCCESS)
    expect(fetchMock.calls[0].url).toBe(
      'https://chromemanagement.googleapis.com/v1/customers/my_customer/reports:countChromeVersions?pageSize=10&orgUnitId=ou1&alt=json',
    )
  })

  it('does not accept -r on methods without a request body', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock)

    const code = await runCli(
      chromeManagementCli,
      ['customers', 'telemetry-devices-get', `${TEST_CONFIG.customer}/telemetry/devices/d1`, '-r', 'name=x'],
      testIo.io,
    )

    expect(code).toBe(EXIT_INVALID_OPTIONS)
    expect(testIo.stderr()).toContain("unknown option '-r'")
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('rejects an unknown method', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock)

    const code = await runCli(chromeManagementCli, ['customers', 'apps-ios-get', 'x'], testIo.io)

    expect(code).toBe(EXIT_INVALID_OPTIONS)
    expect(testIo.stderr()).toContain("unknown command 'apps-ios-get'")
  })

  it('prints the version', async () => {
    const fetchMock = createFetchMock()
    testIo = await createTestIo(fetchMock)

    const code = await runCli(chromeManagementCli, ['--version'], testIo.io)

    expect(code).toBe(EXIT_SUCCESS)
    expect(testIo.stdout()).toBe(`${SDK_VERSION}\n`)
  })
})
