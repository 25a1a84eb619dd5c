/**
 * Authority Errors
 *
 * Typed errors raised by the engine. Default-deny outcomes are decisions,
 * not errors, and never surface here.
 */

import { formatValidationErrors, type ValidationError } from '@warden/shared';

export type AuthorityErrorCode =
  | 'alias_not_found'
  | 'unresolvable_resource'
  | 'rule_store_locked'
  | 'invalid_config';

/**
 * Base class for engine errors
 */
export class AuthorityError extends Error {
  public readonly code: AuthorityErrorCode;

  constructor(code: AuthorityErrorCode, message: string) {
    super(message);
    this.name = 'AuthorityError';
    this.code = code;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised by `requireAlias` for a name that was never registered
 */
export class AliasNotFoundError extends AuthorityError {
  public readonly aliasName: string;

  constructor(aliasName: string) {
    super('alias_not_found', `Alias '${aliasName}' is not registered`);
    this.name = 'AliasNotFoundError';
    this.aliasName = aliasName;
  }
}

/**
 * Raised by a resolver that cannot name the type of a resource value.
 * Queries treat it as no match; rule definitions let it propagate.
 */
export class UnresolvableResourceError extends AuthorityError {
  constructor(message = 'Resource type could not be resolved') {
    super('unresolvable_resource', message);
    this.name = 'UnresolvableResourceError';
  }
}

/**
 * Raised when a rule is added after lookups under the 'lock' cache policy
 */
export class RuleStoreLockedError extends AuthorityError {
  constructor() {
    super(
      'rule_store_locked',
      'Rules and aliases cannot change after the relevance cache has been filled (cache policy: lock)'
    );
    this.name = 'RuleStoreLockedError';
  }
}

export class InvalidConfigError extends AuthorityError {
  public readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super('invalid_config', `Invalid authority configuration: ${formatValidationErrors(errors)}`);
    this.name = 'InvalidConfigError';
    this.errors = errors;
  }
}

/**
 * Type guard for engine errors
 */
export function isAuthorityError(error: unknown): error is AuthorityError {
  return error instanceof AuthorityError;
}
