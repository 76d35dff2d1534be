/**
 * Messaging Module
 *
 * Rate-limited bulk dispatch through a WhatsApp provider, and reconciliation
 * of the provider's delivery-status callbacks.
 */

// Core types
export type {
  CanonicalStatus,
  ReconciliationPolicy,
  ProviderName,
  SubmittedMessage,
  Recipient,
  MessageDirection,
  MessageAttempt,
  DispatchStatus,
  RecipientOutcome,
  DispatchProgressEvent,
  BulkSendResult,
  StatusCallback,
  ReconcileOutcome,
  InboundMessage,
  MessageStats,
} from './core/types.js';

export {
  BODY_STORAGE_LIMIT,
  FALLBACK_MESSAGES_PER_SECOND,
  CANONICAL_STATUSES,
} from './core/types.js';

// Core errors
export type {
  ConfigurationError,
  TransportError,
  ProviderRejection,
  UnrecognizedCallback,
  DatabaseError,
  DuplicateAttemptError,
  SendError,
  AttemptWriteError,
  MessagingError,
} from './core/errors.js';

export {
  createConfigurationError,
  createTransportError,
  createProviderRejection,
  createUnrecognizedCallback,
  createDatabaseError,
  createDuplicateAttemptError,
  getErrorMessage,
} from './core/errors.js';

// Core ports
export type {
  ProviderAdapter,
  MessageAttemptRepository,
  CreateMessageAttemptInput,
  UpdateStatusOptions,
  StatusCountRow,
  ContactDirectory,
  Clock,
} from './core/ports.js';

// Core logic
export { makeRateLimiter, type RateLimiter, type RateLimiterOptions } from './core/rate-limiter.js';
export {
  makeInboundLimiter,
  DEFAULT_INBOUND_MAX_MESSAGES,
  DEFAULT_INBOUND_WINDOW_MS,
  type InboundLimiter,
  type InboundLimiterOptions,
} from './core/inbound-limiter.js';
export {
  renderTemplate,
  recipientTemplateValues,
  truncateForStorage,
  TEMPLATE_PLACEHOLDERS,
  type TemplatePlaceholder,
  type TemplateValues,
} from './core/template.js';
export { normalizeStatus, forwardPredecessors, isCanonicalStatus } from './core/status-mapping.js';
export {
  parseMetaWebhook,
  parseTwilioStatusForm,
  parseTwilioInboundForm,
  type ParsedCallbacks,
} from './core/callback-payloads.js';

// Use cases
export {
  streamBulkDispatch,
  dispatchBulk,
  type DispatchBulkDeps,
  type DispatchBulkInput,
  type ProgressCallback,
} from './core/usecases/dispatch-bulk.js';
export { reconcileStatus, type ReconcileStatusDeps } from './core/usecases/reconcile-status.js';
export {
  recordInbound,
  type RecordInboundDeps,
  type RecordInboundOutcome,
} from './core/usecases/record-inbound.js';
export {
  getMessageStats,
  type GetMessageStatsDeps,
  type GetMessageStatsInput,
} from './core/usecases/get-message-stats.js';

// Shell - Providers
export {
  resolveProviderSettings,
  makeProviderAdapter,
  makeUnconfiguredAdapter,
  type ProviderSettings,
  type TwilioSettings,
  type MetaSettings,
  type ProviderAdapterDeps,
} from './shell/providers/index.js';
export {
  makeTwilioAdapter,
  mapTwilioError,
  toTwilioAddress,
  type TwilioMessagesApi,
  type TwilioAdapterConfig,
} from './shell/providers/twilio-adapter.js';
export {
  makeMetaAdapter,
  metaMessagesUrl,
  toMetaRecipient,
  META_REQUEST_TIMEOUT_MS,
  type FetchFn,
  type MetaAdapterConfig,
} from './shell/providers/meta-adapter.js';

// Shell - Repositories
export { makeMessageAttemptRepo, type MessageAttemptRepoConfig } from './shell/repo/message-attempt-repo.js';
export { makeContactRepo, type ContactRepoConfig } from './shell/repo/contact-repo.js';

// Shell - REST
export { makeWebhookRoutes, type WebhookRoutesDeps } from './shell/rest/webhook-routes.js';
export { makeDispatchRoutes, type DispatchRoutesDeps } from './shell/rest/dispatch-routes.js';

// Shell - Support
export { secretsMatch } from './shell/crypto/secret-compare.js';
export { systemClock } from './shell/system-clock.js';
