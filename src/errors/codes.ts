/**
 * Error codes raised by the registries.
 *
 * The string value of each code is the error name indexers and callers
 * match on, so values must stay stable across releases.
 */
export enum ErrorCode {
  // authorization
  UNAUTHORIZED_REGISTRATION = 'UnauthorizedRegistration',
  UNAUTHORIZED_UPDATE = 'UnauthorizedUpdate',
  UNAUTHORIZED_FEEDBACK = 'UnauthorizedFeedback',
  UNAUTHORIZED_VALIDATOR = 'UnauthorizedValidator',

  // not found
  AGENT_NOT_FOUND = 'AgentNotFound',
  VALIDATION_REQUEST_NOT_FOUND = 'ValidationRequestNotFound',
  DID_NOT_REGISTERED = 'DIDNotRegistered',

  // conflict
  DOMAIN_ALREADY_REGISTERED = 'DomainAlreadyRegistered',
  DID_ALREADY_REGISTERED = 'DIDAlreadyRegistered',
  ADDRESS_ALREADY_REGISTERED = 'AddressAlreadyRegistered',
  FEEDBACK_ALREADY_AUTHORIZED = 'FeedbackAlreadyAuthorized',
  VALIDATION_ALREADY_RESPONDED = 'ValidationAlreadyResponded',

  // validation
  INVALID_INPUT = 'InvalidInput',
  INVALID_ADDRESS = 'InvalidAddress',
  INVALID_DATA_HASH = 'InvalidDataHash',
  INVALID_RESPONSE = 'InvalidResponse',
  DID_ADDRESS_MISMATCH = 'DIDAddressMismatch',
  INVALID_AGENT_SIGNATURE = 'InvalidAgentSignature',
  SIGNATURE_EXPIRED = 'SignatureExpired',
  INVALID_DEVELOPER_DID = 'InvalidDeveloperDID',
  INSUFFICIENT_FEE = 'InsufficientFee',
  INVALID_CONFIG = 'InvalidConfig',

  // temporal
  REQUEST_EXPIRED = 'RequestExpired',
}

/** Broad family an {@link ErrorCode} belongs to */
export type ErrorCategory = 'authorization' | 'not-found' | 'conflict' | 'validation' | 'temporal';

export const ERROR_CATEGORIES: Readonly<Record<ErrorCode, ErrorCategory>> = {
  [ErrorCode.UNAUTHORIZED_REGISTRATION]: 'authorization',
  [ErrorCode.UNAUTHORIZED_UPDATE]: 'authorization',
  [ErrorCode.UNAUTHORIZED_FEEDBACK]: 'authorization',
  [ErrorCode.UNAUTHORIZED_VALIDATOR]: 'authorization',
  [ErrorCode.AGENT_NOT_FOUND]: 'not-found',
  [ErrorCode.VALIDATION_REQUEST_NOT_FOUND]: 'not-found',
  [ErrorCode.DID_NOT_REGISTERED]: 'not-found',
  [ErrorCode.DOMAIN_ALREADY_REGISTERED]: 'conflict',
  [ErrorCode.DID_ALREADY_REGISTERED]: 'conflict',
  [ErrorCode.ADDRESS_ALREADY_REGISTERED]: 'conflict',
  [ErrorCode.FEEDBACK_ALREADY_AUTHORIZED]: 'conflict',
  [ErrorCode.VALIDATION_ALREADY_RESPONDED]: 'conflict',
  [ErrorCode.INVALID_INPUT]: 'validation',
  [ErrorCode.INVALID_ADDRESS]: 'validation',
  [ErrorCode.INVALID_DATA_HASH]: 'validation',
  [ErrorCode.INVALID_RESPONSE]: 'validation',
  [ErrorCode.DID_ADDRESS_MISMATCH]: 'validation',
  [ErrorCode.INVALID_AGENT_SIGNATURE]: 'validation',
  [ErrorCode.SIGNATURE_EXPIRED]: 'validation',
  [ErrorCode.INVALID_DEVELOPER_DID]: 'validation',
  [ErrorCode.INSUFFICIENT_FEE]: 'validation',
  [ErrorCode.INVALID_CONFIG]: 'validation',
  [ErrorCode.REQUEST_EXPIRED]: 'temporal',
};
