import { ChromeManagement } from '../../apis/chromemanagement/chromemanagement.hub.ts'
import { CUSTOMER_METHODS } from '../../apis/chromemanagement/customers.api.ts'
import { cliMethods } from '../methods.ts'
import type { TCliDefinition } from '../types.ts'

export const chromeManagementCli: TCliDefinition = {
  name: 'chromemanagement1',
  description: 'The Chrome Management API is a suite of services that allows Chrome administrators to view, manage and gain insights on their Chrome OS and Chrome Browser devices.',
  resources: [{ name: 'customers', methods: cliMethods(CUSTOMER_METHODS) }],
  createHub: (options) => new ChromeManagement(options),
}
