import { z } from 'zod'
import { fieldMask, googleTypeDateSchema, googleTypeMoneySchema, message } from '../../types/google.ts'

export const allUpdatesRuleSchema = message({
  disableDefaultIamRecipients: z.boolean().optional(),
  monitoringNotificationChannels: z.array(z.string()).optional(),
  pubsubTopic: z.string().optional(),
  schemaVersion: z.string().optional(),
})

/** Either a fixed amount or last period's spend; exactly one should be set. */
export const budgetAmountSchema = message({
  lastPeriodAmount: message({}).optional(),
  specifiedAmount: googleTypeMoneySchema.optional(),
})

export const customPeriodSchema = message({
  endDate: googleTypeDateSchema.optional(),
  startDate: googleTypeDateSchema.optional(),
})

export const budgetFilterSchema = message({
  calendarPeriod: z.string().optional(),
  creditTypes: z.array(z.string()).optional(),
  creditTypesTreatment: z.string().optional(),
  customPeriod: customPeriodSchema.optional(),
  labels: z.record(z.array(z.unknown())).optional(),
  projects: z.array(z.string()).optional(),
  services: z.array(z.string()).optional(),
  subaccounts: z.array(z.string()).optional(),
})

export const thresholdRuleSchema = message({
  spendBasis: z.string().optional(),
  thresholdPercent: z.number().optional(),
})

/** A budget plan and the rules to run as spend is tracked against it. */
export const budgetSchema = message({
  allUpdatesRule: allUpdatesRuleSchema.optional(),
  amount: budgetAmountSchema.optional(),
  budgetFilter: budgetFilterSchema.optional(),
  displayName: z.string().optional(),
  etag: z.string().optional(),
  name: z.string().optional(),
  thresholdRules: z.array(thresholdRuleSchema).optional(),
})
export type TBudget = z.infer<typeof budgetSchema>

export const createBudgetRequestSchema = message({
  budget: budgetSchema.optional(),
})
export type TCreateBudgetRequest = z.infer<typeof createBudgetRequestSchema>

export const updateBudgetRequestSchema = message({
  budget: budgetSchema.optional(),
  updateMask: fieldMask.optional(),
})
export type TUpdateBudgetRequest = z.infer<typeof updateBudgetRequestSchema>

export const listBudgetsResponseSchema = message({
  budgets: z.array(budgetSchema).optional(),
  nextPageToken: z.string().optional(),
})
export type TListBudgetsResponse = z.infer<typeof listBudgetsResponseSchema>
