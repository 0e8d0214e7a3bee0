import { z } from 'zod'
import type { Hub } from '../../core/hub.ts'
import { defineMethod, NO_QUERY } from '../../core/method.ts'
import { fieldMask } from '../../types/google.ts'
import {
  appDetailsSchema,
  countChromeAppRequestsResponseSchema,
  countChromeDevicesReachingAutoExpirationDateResponseSchema,
  countChromeDevicesThatNeedAttentionResponseSchema,
  countChromeHardwareFleetDevicesResponseSchema,
  countChromeVersionsResponseSchema,
  countInstalledAppsResponseSchema,
  findInstalledAppDevicesResponseSchema,
  listTelemetryDevicesResponseSchema,
  listTelemetryEventsResponseSchema,
  telemetryDeviceSchema,
} from './schemas.ts'
import { ChromeManagementScope } from './scopes.ts'

const pageSize = z.coerce.number().int().min(1)

const APP_SCOPES = [ChromeManagementScope.AppdetailsReadonly]
const REPORT_SCOPES = [ChromeManagementScope.ReportsReadonly]
const TELEMETRY_SCOPES = [ChromeManagementScope.TelemetryReadonly]

function appGet(kind: 'android' | 'chrome' | 'web') {
  return defineMethod({
    id: `chromemanagement.customers.apps.${kind}.get`,
    httpMethod: 'GET',
    path: 'v1/{+name}',
    pathParameters: ['name'],
    query: NO_QUERY,
    scopes: APP_SCOPES,
    response: appDetailsSchema,
  })
}

export const CUSTOMER_METHODS = {
  appsAndroidGet: appGet('android'),
  appsChromeGet: appGet('chrome'),
  appsWebGet: appGet('web'),

  appsCountChromeAppRequests: defineMethod({
    id: 'chromemanagement.customers.apps.countChromeAppRequests',
    httpMethod: 'GET',
    path: 'v1/{+customer}/apps:countChromeAppRequests',
    pathParameters: ['customer'],
    query: z.object({
      pageToken: z.string().optional(),
      pageSize: pageSize.max(50).optional(),
      orgUnitId: z.string().optional(),
      orderBy: z.string().optional(),
    }),
    scopes: APP_SCOPES,
    response: countChromeAppRequestsResponseSchema,
  }),

  reportsCountChromeDevicesReachingAutoExpirationDate: defineMethod({
    id: 'chromemanagement.customers.reports.countChromeDevicesReachingAutoExpirationDate',
    httpMethod: 'GET',
    path: 'v1/{+customer}/reports:countChromeDevicesReachingAutoExpirationDate',
    pathParameters: ['customer'],
    query: z.object({
      orgUnitId: z.string().optional(),
      minAueDate: z.string().optional(),
      maxAueDate: z.string().optional(),
    }),
    scopes: REPORT_SCOPES,
    response: countChromeDevicesReachingAutoExpirationDateResponseSchema,
  }),

  reportsCountChromeDevicesThatNeedAttention: defineMethod({
    id: 'chromemanagement.customers.reports.countChromeDevicesThatNeedAttention',
    httpMethod: 'GET',
    path: 'v1/{+customer}/reports:countChromeDevicesThatNeedAttention',
    pathParameters: ['customer'],
    query: z.object({
      readMask: fieldMask.optional(),
      orgUnitId: z.string().optional(),
    }),
    scopes: REPORT_SCOPES,
    response: countChromeDevicesThatNeedAttentionResponseSchema,
  }),

  reportsCountChromeHardwareFleetDevices: defineMethod({
    id: 'chromemanagement.customers.reports.countChromeHardwareFleetDevices',
    httpMethod: 'GET',
    path: 'v1/{+customer}/reports:countChromeHardwareFleetDevices',
    pathParameters: ['customer'],
    query: z.object({
      readMask: fieldMask.optional(),
      orgUnitId: z.string().optional(),
    }),
    scopes: REPORT_SCOPES,
    response: countChromeHardwareFleetDevicesResponseSchema,
  }),

  reportsCountChromeVersions: defineMethod({
    id: 'chromemanagement.customers.reports.countChromeVersions',
    httpMethod: 'GET',
    path: 'v1/{+customer}/reports:countChromeVersions',
    pathParameters: ['customer'],
    query: z.object({
      pageToken: z.string().optional(),
      pageSize: pageSize.max(100).optional(),
      orgUnitId: z.string().optional(),
      filter: z.string().optional(),
    }),
    scopes: REPORT_SCOPES,
    response: countChromeVersionsResponseSchema,
  }),

  reportsCountInstalledApps: defineMethod({
    id: 'chromemanagement.customers.reports.countInstalledApps',
    httpMethod: 'GET',
    path: 'v1/{+customer}/reports:countInstalledApps',
    pathParameters: ['customer'],
    query: z.object({
      pageToken: z.string().optional(),
      pageSize: pageSize.max(100).optional(),
      orgUnitId: z.string().optional(),
      orderBy: z.string().optional(),
      filter: z.string().optional(),
    }),
    scopes: REPORT_SCOPES,
    response: countInstalledAppsResponseSchema,
  }),

  reportsFindInstalledAppDevices: defineMethod({
    id: 'chromemanagement.customers.reports.findInstalledAppDevices',
    httpMethod: 'GET',
    path: 'v1/{+customer}/reports:findInstalledAppDevices',
    pathParameters: ['customer'],
    query: z.object({
      pageToken: z.string().optional(),
      pageSize: pageSize.max(100).optional(),
      orgUnitId: z.string().optional(),
      orderBy: z.string().optional(),
      filter: z.string().optional(),
      appType: z.string().optional(),
      appId: z.string().optional(),
    }),
    scopes: REPORT_SCOPES,
    response: findInstalledAppDevicesResponseSchema,
  }),

  telemetryDevicesGet: defineMethod({
    id: 'chromemanagement.customers.telemetry.devices.get',
    httpMethod: 'GET',
    path: 'v1/{+name}',
    pathParameters: ['name'],
    query: z.object({
      readMask: fieldMask.optional(),
    }),
    scopes: TELEMETRY_SCOPES,
    response: telemetryDeviceSchema,
  }),

  telemetryDevicesList: defineMethod({
    id: 'chromemanagement.customers.telemetry.devices.list',
    httpMethod: 'GET',
    path: 'v1/{+parent}/telemetry/devices',
    pathParameters: ['parent'],
    query: z.object({
      readMask: fieldMask.optional(),
      pageToken: z.string().optional(),
      pageSize: pageSize.max(1000).optional(),
      filter: z.string().optional(),
    }),
    scopes: TELEMETRY_SCOPES,
    response: listTelemetryDevicesResponseSchema,
  }),

  telemetryEventsList: defineMethod({
    id: 'chromemanagement.customers.telemetry.events.list',
    httpMethod: 'GET',
    path: 'v1/{+parent}/telemetry/events',
    pathParameters: ['parent'],
    query: z.object({
      readMask: fieldMask.optional(),
      pageToken: z.string().optional(),
      pageSize: pageSize.max(1000).optional(),
      filter: z.string().optional(),
    }),
    scopes: TELEMETRY_SCOPES,
    response: listTelemetryEventsResponseSchema,
  }),
}

/** Methods on `customers` resources, reached through `ChromeManagement.customers()`. */
export class CustomerMethods {
  private readonly hub: Hub

  constructor(hub: Hub) {
    this.hub = hub
  }

  /**
   * Get a specific app for a customer by its resource name, e.g.
   * `customers/my_customer/apps/android/com.google.android.apps.docs`.
   */
  appsAndroidGet(name: string) {
    return this.hub.call(CUSTOMER_METHODS.appsAndroidGet, { name })
  }

  /** e.g. `customers/my_customer/apps/chrome/gmbmikajjgmnabiglmofipeabaddhgne@2.1.2`. */
  appsChromeGet(name: string) {
    return this.hub.call(CUSTOMER_METHODS.appsChromeGet, { name })
  }

  appsWebGet(name: string) {
    return this.hub.call(CUSTOMER_METHODS.appsWebGet, { name })
  }

  /** Generate summary of app installation requests. */
  appsCountChromeAppRequests(customer: string) {
    return this.hub.call(CUSTOMER_METHODS.appsCountChromeAppRequests, { customer })
  }

  /** Devices expiring in each month of the selected time frame, grouped by model. */
  reportsCountChromeDevicesReachingAutoExpirationDate(customer: string) {
    return this.hub.call(CUSTOMER_METHODS.reportsCountChromeDevicesReachingAutoExpirationDate, {
      customer,
    })
  }

  reportsCountChromeDevicesThatNeedAttention(customer: string) {
    return this.hub.call(CUSTOMER_METHODS.reportsCountChromeDevicesThatNeedAttention, { customer })
  }

  reportsCountChromeHardwareFleetDevices(customer: string) {
    return this.hub.call(CUSTOMER_METHODS.reportsCountChromeHardwareFleetDevices, { customer })
  }

  /** Generate report of installed Chrome versions. */
  reportsCountChromeVersions(customer: string) {
    return this.hub.call(CUSTOMER_METHODS.reportsCountChromeVersions, { customer })
  }

  reportsCountInstalledApps(customer: string) {
    return this.hub.call(CUSTOMER_METHODS.reportsCountInstalledApps, { customer })
  }

  /** Devices that have a specific app installed. Set `appId` (and usually `appType`). */
  reportsFindInstalledAppDevices(customer: string) {
    return this.hub.call(CUSTOMER_METHODS.reportsFindInstalledAppDevices, { customer })
  }

  telemetryDevicesGet(name: string) {
    return this.hub.call(CUSTOMER_METHODS.telemetryDevicesGet, { name })
  }

  telemetryDevicesList(parent: string) {
    return this.hub.call(CUSTOMER_METHODS.telemetryDevicesList, { parent })
  }

  telemetryEventsList(parent: string) {
    return this.hub.call(CUSTOMER_METHODS.telemetryEventsList, { parent })
  }
}
