import { Hub, type THubOptions } from '../../core/hub.ts'
import { BillingAccountMethods } from './billing-accounts.api.ts'

const DEFAULT_URL = 'https://billingbudgets.googleapis.com/'

/** Cloud Billing Budget API v1beta1. */
export class CloudBillingBudget extends Hub {
  constructor(options: THubOptions) {
    super(options, { baseUrl: DEFAULT_URL, rootUrl: DEFAULT_URL })
  }

  public billingAccounts(): BillingAccountMethods {
    return new BillingAccountMethods(this)
  }
}
