/**
 * Rule Store and Relevance Cache
 *
 * The store is an append-only log: index order is addition order, and
 * later rules take precedence. The cache is a derived index of relevant
 * rules per (action, resource type) query.
 */

import { createLogger, type LogContext } from '@warden/shared';
import type { CachePolicy } from './config';
import { RuleStoreLockedError } from './errors';
import type { Rule } from './rule';
import type { ActionMatcher } from './types';

const log = createLogger().module('RULE-STORE');

export class RuleStore<TUser = unknown, TValue = unknown> implements Iterable<Rule<TUser, TValue>> {
  private readonly rules: Rule<TUser, TValue>[] = [];

  add(rule: Rule<TUser, TValue>): void {
    this.rules.push(rule);
  }

  /**
   * All rules in addition order
   */
  all(): readonly Rule<TUser, TValue>[] {
    return [...this.rules];
  }

  /**
   * Rules relevant to the action set and resource type, in addition order
   */
  getRelevantRules(actions: ActionMatcher, resourceType: string): Rule<TUser, TValue>[] {
    return this.rules.filter((rule) => rule.isRelevant(actions, resourceType));
  }

  get count(): number {
    return this.rules.length;
  }

  [Symbol.iterator](): Iterator<Rule<TUser, TValue>> {
    return this.rules[Symbol.iterator]();
  }
}

/**
 * Lazily filled (action, resource type) → relevant rules index.
 *
 * What happens to filled entries when a rule or alias is added depends on
 * the cache policy:
 * - invalidate: the whole cache is cleared
 * - lock: the add is rejected with RuleStoreLockedError
 * - retain: entries are kept; the new rule is invisible to keys cached before it
 */
export class RelevanceCache<TUser = unknown, TValue = unknown> {
  readonly policy: CachePolicy;
  private readonly store: RuleStore<TUser, TValue>;
  // Nested so that ':' inside action or resource names cannot collide
  private readonly entries = new Map<string, Map<string, readonly Rule<TUser, TValue>[]>>();
  private filled = false;

  constructor(store: RuleStore<TUser, TValue>, policy: CachePolicy) {
    this.store = store;
    this.policy = policy;
  }

  /**
   * Cached relevant rules for the query, filled from the store on miss.
   *
   * @param action - Action as queried (cache key)
   * @param resourceType - Resolved resource type (cache key)
   * @param expand - Produces the alias-expanded action set on miss
   */
  get(
    action: string,
    resourceType: string,
    expand: () => ActionMatcher
  ): readonly Rule<TUser, TValue>[] {
    let byResource = this.entries.get(action);
    if (!byResource) {
      byResource = new Map();
      this.entries.set(action, byResource);
    }

    let rules = byResource.get(resourceType);
    if (!rules) {
      rules = this.store.getRelevantRules(expand(), resourceType);
      byResource.set(resourceType, rules);
      this.filled = true;
    }
    return rules;
  }

  /**
   * Apply the cache policy ahead of a store append
   */
  beforeAdd(rule: Rule<TUser, TValue>): void {
    this.beforeMutation('Rule added after lookups; cached queries will not see it', {
      ruleId: rule.id,
      action: rule.getAction(),
      resourceType: rule.getResource(),
    });
  }

  /**
   * Apply the cache policy ahead of an alias registration. Cached entries
   * hold rules matched through the expansion in force when they were filled.
   */
  beforeAliasChange(name: string, actions: readonly string[]): void {
    this.beforeMutation('Alias changed after lookups; cached queries keep the old expansion', {
      alias: name,
      actions,
    });
  }

  private beforeMutation(message: string, context: LogContext): void {
    if (!this.filled) {
      return;
    }

    switch (this.policy) {
      case 'invalidate':
        this.clear();
        break;
      case 'lock':
        throw new RuleStoreLockedError();
      case 'retain':
        log.warn(message, { ...context, cachedKeys: this.size });
        break;
    }
  }

  clear(): void {
    this.entries.clear();
    this.filled = false;
  }

  /**
   * Number of cached (action, resource type) entries
   */
  get size(): number {
    let total = 0;
    for (const byResource of this.entries.values()) {
      total += byResource.size;
    }
    return total;
  }
}
