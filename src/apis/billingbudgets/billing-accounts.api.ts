import { z } from 'zod'
import type { Hub } from '../../core/hub.ts'
import { defineMethod, NO_QUERY } from '../../core/method.ts'
import { emptySchema } from '../../types/google.ts'
import {
  budgetSchema,
  createBudgetRequestSchema,
  listBudgetsResponseSchema,
  updateBudgetRequestSchema,
  type TCreateBudgetRequest,
  type TUpdateBudgetRequest,
} from './schemas.ts'
import { CloudBillingBudgetScope } from './scopes.ts'

const SCOPES = [CloudBillingBudgetScope.CloudPlatform, CloudBillingBudgetScope.CloudBilling]

export const BILLING_ACCOUNT_METHODS = {
  budgetsCreate: defineMethod({
    id: 'billingbudgets.billingAccounts.budgets.create',
    httpMethod: 'POST',
    path: 'v1beta1/{+parent}/budgets',
    pathParameters: ['parent'],
    query: NO_QUERY,
    scopes: SCOPES,
    response: budgetSchema,
    request: createBudgetRequestSchema,
  }),

  budgetsDelete: defineMethod({
    id: 'billingbudgets.billingAccounts.budgets.delete',
    httpMethod: 'DELETE',
    path: 'v1beta1/{+name}',
    pathParameters: ['name'],
    query: NO_QUERY,
    scopes: SCOPES,
    response: emptySchema,
  }),

  budgetsGet: defineMethod({
    id: 'billingbudgets.billingAccounts.budgets.get',
    httpMethod: 'GET',
    path: 'v1beta1/{+name}',
    pathParameters: ['name'],
    query: NO_QUERY,
    scopes: SCOPES,
    response: budgetSchema,
  }),

  budgetsList: defineMethod({
    id: 'billingbudgets.billingAccounts.budgets.list',
    httpMethod: 'GET',
    path: 'v1beta1/{+parent}/budgets',
    pathParameters: ['parent'],
    query: z.object({
      pageSize: z.coerce.number().int().min(1).max(100).optional(),
      pageToken: z.string().optional(),
    }),
    scopes: SCOPES,
    response: listBudgetsResponseSchema,
  }),

  budgetsPatch: defineMethod({
    id: 'billingbudgets.billingAccounts.budgets.patch',
    httpMethod: 'PATCH',
    path: 'v1beta1/{+name}',
    pathParameters: ['name'],
    query: NO_QUERY,
    scopes: SCOPES,
    response: budgetSchema,
    request: updateBudgetRequestSchema,
  }),
}

export class BillingAccountMethods {
  private readonly hub: Hub

  constructor(hub: Hub) {
    this.hub = hub
  }

  /**
   * Creates a new budget under `parent`, a billing account of the form
   * `billingAccounts/{billingAccountId}`.
   */
  budgetsCreate(request: TCreateBudgetRequest, parent: string) {
    return this.hub.call(BILLING_ACCOUNT_METHODS.budgetsCreate, { parent }, request)
  }

  /** Deletes a budget. Succeeds if it is already deleted. */
  budgetsDelete(name: string) {
    return this.hub.call(BILLING_ACCOUNT_METHODS.budgetsDelete, { name })
  }

  budgetsGet(name: string) {
    return this.hub.call(BILLING_ACCOUNT_METHODS.budgetsGet, { name })
  }

  budgetsList(parent: string) {
    return this.hub.call(BILLING_ACCOUNT_METHODS.budgetsList, { parent })
  }

  /** Updates the fields of `request.budget` named in `request.updateMask` (all when unset). */
  budgetsPatch(request: TUpdateBudgetRequest, name: string) {
    return this.hub.call(BILLING_ACCOUNT_METHODS.budgetsPatch, { name }, request)
  }
}
