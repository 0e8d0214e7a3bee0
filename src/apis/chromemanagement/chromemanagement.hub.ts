import { Hub, type THubOptions } from '../../core/hub.ts'
import { CustomerMethods } from './customers.api.ts'

const DEFAULT_URL = 'https://chromemanagement.googleapis.com/'

/**
 * Chrome Management API v1: Chrome browser and ChromeOS device reports, app details and
 * telemetry for a Google Workspace customer.
 */
export class ChromeManagement extends Hub {
  constructor(options: THubOptions) {
    super(options, { baseUrl: DEFAULT_URL, rootUrl: DEFAULT_URL })
  }

  public customers(): CustomerMethods {
    return new CustomerMethods(this)
  }
}
