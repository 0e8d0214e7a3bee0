export const CloudBillingBudgetScope = {
  /** View and manage your Google Cloud Platform billing accounts. */
  CloudBilling: 'https://www.googleapis.com/auth/cloud-billing',
  /** See, edit, configure, and delete your Google Cloud data. */
  CloudPlatform: 'https://www.googleapis.com/auth/cloud-platform',
} as const

export type TCloudBillingBudgetScope =
  (typeof CloudBillingBudgetScope)[keyof typeof CloudBillingBudgetScope]
