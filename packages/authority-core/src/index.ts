/**
 * @warden/authority-core
 *
 * Rule-based authorization engine: privileges and restrictions per action
 * and resource type, optional predicates, action aliases, and
 * most-recent-rule-wins evaluation with default deny.
 *
 * @example
 * ```typescript
 * import { Authority } from '@warden/authority-core';
 *
 * const authority = new Authority<User, User>(currentUser);
 *
 * authority.addAlias('manage', ['create', 'read', 'update', 'delete']);
 * authority.allow('read', 'User');
 * authority.allow('manage', 'User', (ctx, user) => user?.id === ctx.user.id);
 *
 * authority.can('read', 'User'); // true
 * authority.can('delete', 'User', someoneElse); // false
 * ```
 */

// Types
export { ALL_RESOURCES } from './types';
export type {
  RuleBehavior,
  ResourceRef,
  ResourceArg,
  ResolvedResource,
  ResourceTypeResolver,
  ActionMatcher,
  AuthorityView,
  EvaluationContext,
  Predicate,
  AuthorityDecision,
} from './types';

// Engine
export { Authority } from './engine';

// Building blocks
export { Rule } from './rule';
export { AliasRegistry, RuleAlias } from './alias-registry';
export { RuleStore, RelevanceCache } from './rule-store';
export { typeRef, valueRef, constructorNameResolver, normalizeResource } from './resource';

// Events
export { AUTHORITY_EVENTS, createEventSink } from './events';
export type { EventSink, EventPayload, AuthorityEventName } from './events';

// Configuration
export {
  CACHE_POLICIES,
  DEFAULT_AUTHORITY_SETTINGS,
  resolveAuthorityConfig,
  getConfigFromEnv,
} from './config';
export type { CachePolicy, AuthorityConfig, AuthoritySettings } from './config';

// Errors
export {
  AuthorityError,
  AliasNotFoundError,
  UnresolvableResourceError,
  RuleStoreLockedError,
  InvalidConfigError,
  isAuthorityError,
} from './errors';
export type { AuthorityErrorCode } from './errors';
