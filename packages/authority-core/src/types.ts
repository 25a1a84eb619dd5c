/**
 * Authority Core Types
 *
 * Type definitions for the rule-based authorization engine.
 */

import type { RuleAlias } from './alias-registry';

/**
 * Outcome of a rule once it applies
 * - privilege: grants access
 * - restriction: denies access
 */
export type RuleBehavior = 'privilege' | 'restriction';

/**
 * Resource sentinel matching any resource type
 */
export const ALL_RESOURCES = 'all';

/**
 * Reference to the resource a rule or query targets.
 *
 * A `type` reference names a resource type directly. A `value` reference
 * carries a concrete resource whose type name is derived by the
 * configured resolver.
 */
export type ResourceRef<TValue = unknown> =
  | { kind: 'type'; name: string }
  | { kind: 'value'; value: TValue };

/**
 * Resource argument accepted by the engine; a plain string is a type name
 */
export type ResourceArg<TValue = unknown> = string | ResourceRef<TValue>;

/**
 * Resource after normalization: always a type name, optionally a value
 */
export interface ResolvedResource<TValue = unknown> {
  type: string;
  value?: TValue;
}

/**
 * Maps a resource value to its type name.
 * Returns undefined (or throws UnresolvableResourceError) when no name can be derived.
 */
export type ResourceTypeResolver<TValue = unknown> = (value: TValue) => string | undefined;

/**
 * Action matcher used by rules: a single action name or a collection of
 * names (the result of alias expansion)
 */
export type ActionMatcher = string | readonly string[] | ReadonlySet<string>;

/**
 * Read access to the engine handed to predicates
 */
export interface AuthorityView<TUser = unknown, TValue = unknown> {
  getCurrentUser(): TUser;
  user(): TUser;
  can(action: string, resource: ResourceArg<TValue>, resourceValue?: TValue): boolean;
  cannot(action: string, resource: ResourceArg<TValue>, resourceValue?: TValue): boolean;
  getAlias(name: string): RuleAlias | undefined;
  getAliasesForAction(action: string): string[];
}

/**
 * Context passed to every predicate invocation
 */
export interface EvaluationContext<TUser = unknown, TValue = unknown> {
  /** Engine performing the evaluation */
  authority: AuthorityView<TUser, TValue>;

  /** Current user at the time of the query */
  user: TUser;

  /** Action as queried (before alias expansion) */
  action: string;

  /** Resolved resource type name */
  resourceType: string;
}

/**
 * Rule condition. The resource value is undefined when the query only
 * named a resource type.
 */
export type Predicate<TUser = unknown, TValue = unknown> = (
  context: EvaluationContext<TUser, TValue>,
  resourceValue: TValue | undefined
) => boolean;

/**
 * Result of a detailed evaluation
 */
export interface AuthorityDecision {
  /** Whether access is allowed */
  allowed: boolean;

  /** Reason for the decision */
  reason: string;

  /** Rule id that decided, 'default' when no rule applied, 'unresolved' when the resource type was unknown */
  decidedBy: string;

  /** Evaluation details (only in verbose mode) */
  details?: Record<string, unknown>;
}
