import { BILLING_ACCOUNT_METHODS } from '../../apis/billingbudgets/billing-accounts.api.ts'
import { CloudBillingBudget } from '../../apis/billingbudgets/billingbudgets.hub.ts'
import { cliMethods } from '../methods.ts'
import type { TCliDefinition } from '../types.ts'

export const billingBudgetsCli: TCliDefinition = {
  name: 'billingbudgets1-beta1',
  description:
    'The Cloud Billing Budget API stores Cloud Billing budgets, which define a budget plan and the rules to execute as spend is tracked against that plan.',
  resources: [{ name: 'billing-accounts', methods: cliMethods(BILLING_ACCOUNT_METHODS) }],
  createHub: (options) => new CloudBillingBudget(options),
}
