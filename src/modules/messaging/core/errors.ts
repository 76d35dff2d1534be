/**
 * Messaging Module - Error Types
 *
 * Discriminated union error types for dispatch and reconciliation.
 */

import type { ProviderName } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Unknown provider selector or missing provider credentials.
 */
export interface ConfigurationError {
  type: 'ConfigurationError';
  message: string;
}

/**
 * Network failure or timeout reaching the provider.
 */
export interface TransportError {
  type: 'TransportError';
  provider: ProviderName;
  message: string;
}

/**
 * Provider answered with a non-success status.
 */
export interface ProviderRejection {
  type: 'ProviderRejection';
  provider: ProviderName;
  message: string;
  httpStatus?: number;
}

/**
 * Status callback that cannot be applied.
 */
export interface UnrecognizedCallback {
  type: 'UnrecognizedCallback';
  reason: 'unknown_status' | 'unknown_message_id';
  provider: ProviderName;
  providerMessageId: string;
  rawStatus: string;
}

/**
 * Database error.
 */
export interface DatabaseError {
  type: 'DatabaseError';
  message: string;
  retryable: boolean;
}

/**
 * A provider message id that is already stored.
 */
export interface DuplicateAttemptError {
  type: 'DuplicateAttempt';
  providerMessageId: string;
}

/**
 * Failure side of a provider send.
 */
export type SendError = ConfigurationError | TransportError | ProviderRejection;

/**
 * Errors returned by the message attempt repository on insert.
 */
export type AttemptWriteError = DatabaseError | DuplicateAttemptError;

/**
 * Union of all messaging errors.
 */
export type MessagingError = SendError | UnrecognizedCallback | AttemptWriteError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createConfigurationError = (message: string): ConfigurationError => ({
  type: 'ConfigurationError',
  message,
});

export const createTransportError = (provider: ProviderName, message: string): TransportError => ({
  type: 'TransportError',
  provider,
  message,
});

export const createProviderRejection = (
  provider: ProviderName,
  message: string,
  httpStatus?: number
): ProviderRejection => ({
  type: 'ProviderRejection',
  provider,
  message,
  ...(httpStatus !== undefined ? { httpStatus } : {}),
});

export const createUnrecognizedCallback = (
  reason: UnrecognizedCallback['reason'],
  callback: { provider: ProviderName; providerMessageId: string; rawStatus: string }
): UnrecognizedCallback => ({
  type: 'UnrecognizedCallback',
  reason,
  provider: callback.provider,
  providerMessageId: callback.providerMessageId,
  rawStatus: callback.rawStatus,
});

/**
 * Creates a database error.
 */
export const createDatabaseError = (message: string, retryable = true): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable,
});

export const createDuplicateAttemptError = (providerMessageId: string): DuplicateAttemptError => ({
  type: 'DuplicateAttempt',
  providerMessageId,
});

// ─────────────────────────────────────────────────────────────────────────────
// Error Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Gets a human-readable message from a messaging error.
 */
export const getErrorMessage = (error: MessagingError): string => {
  switch (error.type) {
    case 'ConfigurationError':
      return error.message;
    case 'TransportError':
      return `${error.provider} transport error: ${error.message}`;
    case 'ProviderRejection':
      return error.message;
    case 'UnrecognizedCallback':
      return error.reason === 'unknown_status'
        ? `Unrecognized ${error.provider} status: ${error.rawStatus}`
        : `Unknown ${error.provider} message id: ${error.providerMessageId}`;
    case 'DatabaseError':
      return error.message;
    case 'DuplicateAttempt':
      return `Duplicate provider message id: ${error.providerMessageId}`;
  }
};
