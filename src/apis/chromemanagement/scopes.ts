/** OAuth2 scopes of the Chrome Management API, narrowest first per resource. */
export const ChromeManagementScope = {
  /** See detailed information about apps installed on Chrome browsers and devices. */
  AppdetailsReadonly: 'https://www.googleapis.com/auth/chrome.management.appdetails.readonly',
  /** See reports about devices and Chrome browsers managed within your organization. */
  ReportsReadonly: 'https://www.googleapis.com/auth/chrome.management.reports.readonly',
  /** See basic device and telemetry information collected from ChromeOS devices or users. */
  TelemetryReadonly: 'https://www.googleapis.com/auth/chrome.management.telemetry.readonly',
} as const

export type TChromeManagementScope = (typeof ChromeManagementScope)[keyof typeof ChromeManagementScope]
