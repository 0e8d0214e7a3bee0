// Hubs
export { ChromeManagement } from './apis/chromemanagement/chromemanagement.hub.ts'
export { CustomerMethods, CUSTOMER_METHODS } from './apis/chromemanagement/customers.api.ts'
export { ChromeManagementScope } from './apis/chromemanagement/scopes.ts'
export type { TChromeManagementScope } from './apis/chromemanagement/scopes.ts'
export type * from './apis/chromemanagement/schemas.ts'

export { CustomSearch } from './apis/customsearch/customsearch.hub.ts'
export { CseMethods, CSE_METHODS } from './apis/customsearch/cse.api.ts'
export type { TSearch, TSearchResult } from './apis/customsearch/schemas.ts'

export { CloudBillingBudget } from './apis/billingbudgets/billingbudgets.hub.ts'
export {
  BillingAccountMethods,
  BILLING_ACCOUNT_METHODS,
} from './apis/billingbudgets/billing-accounts.api.ts'
export { CloudBillingBudgetScope } from './apis/billingbudgets/scopes.ts'
export type { TCloudBillingBudgetScope } from './apis/billingbudgets/scopes.ts'
export type {
  TBudget,
  TCreateBudgetRequest,
  TListBudgetsResponse,
  TUpdateBudgetRequest,
} from './apis/billingbudgets/schemas.ts'

// Pipeline (for defining further hubs)
export { Hub } from './core/hub.ts'
export type { THubOptions, THubDefaults } from './core/hub.ts'
export { Call } from './core/call.ts'
export type { TCallContext } from './core/call.ts'
export { defineMethod, NO_QUERY } from './core/method.ts'
export { Params } from './core/params.ts'
export { expandTemplate, buildUrl, templateParameterNames } from './core/url-template.ts'
export { Transport } from './core/transport.ts'

// Delegates and retries
export {
  BackoffRetryPolicy,
  composeDelegate,
  DEFAULT_DELEGATE,
  Retry,
} from './core/delegate.ts'
export type {
  TBackoffRetryPolicyOptions,
  TDelegate,
  TProgressObserver,
  TRetry,
  TRetryPolicy,
} from './core/delegate.ts'

// Providers - Authentication
export { StaticTokenProvider } from './providers/auth/static-token.ts'
export { RefreshTokenProvider } from './providers/auth/refresh-token.ts'
export type { TRefreshTokenProviderOptions } from './providers/auth/refresh-token.ts'

// Logging
export { logger, setLogLevel } from './core/logger.ts'
export type { TLogLevel } from './core/logger.ts'

// Errors
export {
  HubError,
  AuthError,
  BadRequestError,
  CancelledError,
  ConfigurationError,
  FailureError,
  FieldClashError,
  HttpError,
  InvalidParameterError,
  JsonDecodeError,
  MissingApiKeyError,
  MissingTokenError,
  UploadSizeLimitExceededError,
  isHubError,
} from './core/errors.ts'
export type { TApiError, THubErrorKind, TServerErrorDetail } from './core/errors.ts'

// Types
export type {
  THttpMethod,
  THttpResponse,
  TCallResult,
  TMethodDescriptor,
  TMethodInfo,
  TQueryShape,
  TRequestSpec,
  TTokenProvider,
  TMediaUpload,
} from './core/types.ts'
export type {
  TEmpty,
  TGoogleRpcStatus,
  TGoogleTypeDate,
  TGoogleTypeMoney,
} from './types/google.ts'
