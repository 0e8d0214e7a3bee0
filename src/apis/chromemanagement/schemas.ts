import { z } from 'zod'
import {
  duration,
  googleRpcStatusSchema,
  googleTypeDateSchema,
  int64,
  message,
  timestamp,
} from '../../types/google.ts'

// Apps

export const androidAppPermissionSchema = message({
  type: z.string().optional(),
})

export const androidAppInfoSchema = message({
  permissions: z.array(androidAppPermissionSchema).optional(),
})

export const chromeAppPermissionSchema = message({
  accessUserData: z.boolean().optional(),
  documentationUri: z.string().optional(),
  type: z.string().optional(),
})

export const chromeAppSiteAccessSchema = message({
  hostMatch: z.string().optional(),
})

export const chromeAppInfoSchema = message({
  googleOwned: z.boolean().optional(),
  isCwsHosted: z.boolean().optional(),
  isExtensionPolicySupported: z.boolean().optional(),
  isKioskOnly: z.boolean().optional(),
  isTheme: z.boolean().optional(),
  kioskEnabled: z.boolean().optional(),
  minUserCount: z.number().int().optional(),
  permissions: z.array(chromeAppPermissionSchema).optional(),
  siteAccess: z.array(chromeAppSiteAccessSchema).optional(),
  supportEnabled: z.boolean().optional(),
  type: z.string().optional(),
})

/** Resource representing app details. */
export const appDetailsSchema = message({
  androidAppInfo: androidAppInfoSchema.optional(),
  appId: z.string().optional(),
  chromeAppInfo: chromeAppInfoSchema.optional(),
  description: z.string().optional(),
  detailUri: z.string().optional(),
  displayName: z.string().optional(),
  firstPublishTime: timestamp.optional(),
  homepageUri: z.string().optional(),
  iconUri: z.string().optional(),
  isPaidApp: z.boolean().optional(),
  latestPublishTime: timestamp.optional(),
  name: z.string().optional(),
  privacyPolicyUri: z.string().optional(),
  publisher: z.string().optional(),
  reviewNumber: int64.optional(),
  reviewRating: z.number().optional(),
  revisionId: z.string().optional(),
  serviceError: googleRpcStatusSchema.optional(),
  type: z.string().optional(),
})
export type TAppDetails = z.infer<typeof appDetailsSchema>

export const chromeAppRequestSchema = message({
  appDetails: z.string().optional(),
  appId: z.string().optional(),
  detailUri: z.string().optional(),
  displayName: z.string().optional(),
  iconUri: z.string().optional(),
  latestRequestTime: timestamp.optional(),
  requestCount: int64.optional(),
})

export const countChromeAppRequestsResponseSchema = message({
  nextPageToken: z.string().optional(),
  requestedApps: z.array(chromeAppRequestSchema).optional(),
  totalSize: z.number().int().optional(),
})
export type TCountChromeAppRequestsResponse = z.infer<typeof countChromeAppRequestsResponseSchema>

// Reports

export const deviceAueCountReportSchema = message({
  aueMonth: z.string().optional(),
  aueYear: int64.optional(),
  count: int64.optional(),
  expired: z.boolean().optional(),
  model: z.string().optional(),
})

export const countChromeDevicesReachingAutoExpirationDateResponseSchema = message({
  deviceAueCountReports: z.array(deviceAueCountReportSchema).optional(),
})
export type TCountChromeDevicesReachingAutoExpirationDateResponse = z.infer<
  typeof countChromeDevicesReachingAutoExpirationDateResponseSchema
>

export const countChromeDevicesThatNeedAttentionResponseSchema = message({
  noRecentPolicySyncCount: int64.optional(),
  noRecentUserActivityCount: int64.optional(),
  osVersionNotCompliantCount: int64.optional(),
  pendingUpdate: int64.optional(),
  unsupportedPolicyCount: int64.optional(),
})
export type TCountChromeDevicesThatNeedAttentionResponse = z.infer<
  typeof countChromeDevicesThatNeedAttentionResponseSchema
>

export const deviceHardwareCountReportSchema = message({
  bucket: z.string().optional(),
  count: int64.optional(),
})

export const countChromeHardwareFleetDevicesResponseSchema = message({
  cpuReports: z.array(deviceHardwareCountReportSchema).optional(),
  memoryReports: z.array(deviceHardwareCountReportSchema).optional(),
  modelReports: z.array(deviceHardwareCountReportSchema).optional(),
  storageReports: z.array(deviceHardwareCountReportSchema).optional(),
})
export type TCountChromeHardwareFleetDevicesResponse = z.infer<
  typeof countChromeHardwareFleetDevicesResponseSchema
>

export const browserVersionSchema = message({
  channel: z.string().optional(),
  count: int64.optional(),
  deviceOsVersion: z.string().optional(),
  system: z.string().optional(),
  version: z.string().optional(),
})

export const countChromeVersionsResponseSchema = message({
  browserVersions: z.array(browserVersionSchema).optional(),
  nextPageToken: z.string().optional(),
  totalSize: z.number().int().optional(),
})
export type TCountChromeVersionsResponse = z.infer<typeof countChromeVersionsResponseSchema>

export const installedAppSchema = message({
  appId: z.string().optional(),
  appInstallType: z.string().optional(),
  appSource: z.string().optional(),
  appType: z.string().optional(),
  browserDeviceCount: int64.optional(),
  description: z.string().optional(),
  disabled: z.boolean().optional(),
  displayName: z.string().optional(),
  homepageUri: z.string().optional(),
  osUserCount: int64.optional(),
  permissions: z.array(z.string()).optional(),
})

export const countInstalledAppsResponseSchema = message({
  installedApps: z.array(installedAppSchema).optional(),
  nextPageToken: z.string().optional(),
  totalSize: z.number().int().optional(),
})
export type TCountInstalledAppsResponse = z.infer<typeof countInstalledAppsResponseSchema>

export const deviceSchema = message({
  deviceId: z.string().optional(),
  machine: z.string().optional(),
})

export const findInstalledAppDevicesResponseSchema = message({
  devices: z.array(deviceSchema).optional(),
  nextPageToken: z.string().optional(),
  totalSize: z.number().int().optional(),
})
export type TFindInstalledAppDevicesResponse = z.infer<typeof findInstalledAppDevicesResponseSchema>

// Telemetry. Report arrays not named here pass through undecoded.

export const batteryInfoSchema = message({
  designCapacity: int64.optional(),
  designMinVoltage: z.number().int().optional(),
  manufactureDate: googleTypeDateSchema.optional(),
  manufacturer: z.string().optional(),
  serialNumber: z.string().optional(),
  technology: z.string().optional(),
})

export const cpuInfoSchema = message({
  architecture: z.string().optional(),
  keylockerConfigured: z.boolean().optional(),
  keylockerSupported: z.boolean().optional(),
  maxClockSpeed: z.number().int().optional(),
  model: z.string().optional(),
})

export const cpuStatusReportSchema = message({
  cpuTemperatureInfo: z
    .array(
      message({
        label: z.string().optional(),
        temperatureCelsius: z.number().int().optional(),
      }),
    )
    .optional(),
  cpuUtilizationPct: z.number().int().optional(),
  reportTime: timestamp.optional(),
  sampleFrequency: duration.optional(),
})

export const memoryInfoSchema = message({
  availableRamBytes: int64.optional(),
  totalMemoryEncryption: message({
    encryptionAlgorithm: z.string().optional(),
    encryptionState: z.string().optional(),
    keyLength: int64.optional(),
    maxKeys: int64.optional(),
  }).optional(),
  totalRamBytes: int64.optional(),
})

export const networkDeviceSchema = message({
  iccid: z.string().optional(),
  imei: z.string().optional(),
  macAddress: z.string().optional(),
  mdn: z.string().optional(),
  meid: z.string().optional(),
  type: z.string().optional(),
})

export const osUpdateStatusSchema = message({
  lastRebootTime: timestamp.optional(),
  lastUpdateCheckTime: timestamp.optional(),
  lastUpdateTime: timestamp.optional(),
  newPlatformVersion: z.string().optional(),
  newRequestedPlatformVersion: z.string().optional(),
  updateState: z.string().optional(),
})

export const storageInfoSchema = message({
  availableDiskBytes: int64.optional(),
  totalDiskBytes: int64.optional(),
  volume: z
    .array(
      message({
        storageFreeBytes: int64.optional(),
        storageTotalBytes: int64.optional(),
        volumeId: z.string().optional(),
      }),
    )
    .optional(),
})

export const telemetryDeviceSchema = message({
  batteryInfo: z.array(batteryInfoSchema).optional(),
  cpuInfo: z.array(cpuInfoSchema).optional(),
  cpuStatusReport: z.array(cpuStatusReportSchema).optional(),
  customer: z.string().optional(),
  deviceId: z.string().optional(),
  memoryInfo: memoryInfoSchema.optional(),
  name: z.string().optional(),
  networkInfo: message({ networkDevices: z.array(networkDeviceSchema).optional() }).optional(),
  orgUnitId: z.string().optional(),
  osUpdateStatus: z.array(osUpdateStatusSchema).optional(),
  serialNumber: z.string().optional(),
  storageInfo: storageInfoSchema.optional(),
})
export type TTelemetryDevice = z.infer<typeof telemetryDeviceSchema>

export const listTelemetryDevicesResponseSchema = message({
  devices: z.array(telemetryDeviceSchema).optional(),
  nextPageToken: z.string().optional(),
})
export type TListTelemetryDevicesResponse = z.infer<typeof listTelemetryDevicesResponseSchema>

export const httpsLatencyRoutineDataSchema = message({
  latency: duration.optional(),
  problem: z.string().optional(),
})

export const usbPeripheralReportSchema = message({
  categories: z.array(z.string()).optional(),
  classId: z.number().int().optional(),
  firmwareVersion: z.string().optional(),
  name: z.string().optional(),
  pid: z.number().int().optional(),
  subclassId: z.number().int().optional(),
  vendor: z.string().optional(),
  vid: z.number().int().optional(),
})

export const telemetryEventSchema = message({
  audioSevereUnderrunEvent: message({}).optional(),
  device: message({
    deviceId: z.string().optional(),
    orgUnitId: z.string().optional(),
  }).optional(),
  eventType: z.string().optional(),
  httpsLatencyChangeEvent: message({
    httpsLatencyRoutineData: httpsLatencyRoutineDataSchema.optional(),
    httpsLatencyState: z.string().optional(),
  }).optional(),
  name: z.string().optional(),
  reportTime: timestamp.optional(),
  usbPeripheralsEvent: message({
    usbPeripheralReport: z.array(usbPeripheralReportSchema).optional(),
  }).optional(),
  user: message({
    email: z.string().optional(),
    orgUnitId: z.string().optional(),
  }).optional(),
})
export type TTelemetryEvent = z.infer<typeof telemetryEventSchema>

export const listTelemetryEventsResponseSchema = message({
  nextPageToken: z.string().optional(),
  telemetryEvents: z.array(telemetryEventSchema).optional(),
})
export type TListTelemetryEventsResponse = z.infer<typeof listTelemetryEventsResponseSchema>
