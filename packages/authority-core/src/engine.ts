/**
 * Authority
 *
 * Rule evaluation engine. Rules are consulted most recent first, so an
 * application can declare broad defaults and then layer exceptions on
 * top of them. When no rule applies, access is denied.
 */

import { createLogger } from '@warden/shared';
import { AliasRegistry, type RuleAlias } from './alias-registry';
import { resolveAuthorityConfig, type AuthorityConfig } from './config';
import { AUTHORITY_EVENTS, type EventPayload, type EventSink } from './events';
import { UnresolvableResourceError } from './errors';
import { normalizeResource } from './resource';
import { Rule } from './rule';
import { RelevanceCache, RuleStore } from './rule-store';
import type {
  AuthorityDecision,
  AuthorityView,
  EvaluationContext,
  Predicate,
  ResolvedResource,
  ResourceArg,
  RuleBehavior,
} from './types';

const log = createLogger().module('AUTHORITY');

export class Authority<TUser = unknown, TValue = unknown> implements AuthorityView<TUser, TValue> {
  private currentUser: TUser;
  private eventSink: EventSink | null = null;
  private readonly config: AuthorityConfig<TValue>;
  private readonly rules = new RuleStore<TUser, TValue>();
  private readonly aliases = new AliasRegistry();
  private readonly cache: RelevanceCache<TUser, TValue>;
  private nextRuleId = 1;

  /**
   * @param currentUser - Principal that predicates evaluate against
   * @param eventSink - Optional receiver for lifecycle events
   * @param config - Cache policy, verbosity and resource type resolver
   */
  constructor(
    currentUser: TUser,
    eventSink: EventSink | null = null,
    config: Partial<AuthorityConfig<TValue>> = {}
  ) {
    this.config = resolveAuthorityConfig(config);
    this.cache = new RelevanceCache(this.rules, this.config.cachePolicy);
    this.setEventSink(eventSink);
    this.currentUser = currentUser;

    this.dispatch(AUTHORITY_EVENTS.INITIALIZED, { user: this.getCurrentUser() });
  }

  /**
   * Fire an event on the current sink
   *
   * @returns The sink's result, or undefined without a sink
   */
  dispatch(eventName: string, payload: EventPayload = {}): unknown {
    if (this.eventSink) {
      return this.eventSink.fire(eventName, payload);
    }
    return undefined;
  }

  /**
   * Whether the current user may perform the action on the resource.
   *
   * @param action - Action name (alias names are accepted as well)
   * @param resource - Type name, or a type/value reference
   * @param resourceValue - Value handed to predicates when `resource` names a type
   *
   * @example
   * ```typescript
   * authority.can('read', 'Post');
   * authority.can('update', 'Post', post);
   * authority.can('update', valueRef(post));
   * ```
   */
  can(action: string, resource: ResourceArg<TValue>, resourceValue?: TValue): boolean {
    return this.evaluate(action, resource, resourceValue).allowed;
  }

  cannot(action: string, resource: ResourceArg<TValue>, resourceValue?: TValue): boolean {
    return !this.can(action, resource, resourceValue);
  }

  /**
   * Evaluate a query and describe which rule decided it
   */
  evaluate(action: string, resource: ResourceArg<TValue>, resourceValue?: TValue): AuthorityDecision {
    const target = normalizeResource(resource, resourceValue, this.config.resolver);
    if (!target) {
      log.warn('Resource type could not be resolved, denying', { action });
      return {
        allowed: false,
        reason: 'Resource type could not be resolved',
        decidedBy: 'unresolved',
      };
    }

    const rules = this.relevantRules(action, target.type);
    const context = this.createContext(action, target.type);

    // Most recently added rules take precedence
    for (let i = rules.length - 1; i >= 0; i--) {
      const rule = rules[i];
      if (rule.applies(context, target.value)) {
        const decision: AuthorityDecision = {
          allowed: rule.isPrivilege(),
          reason: `Rule '${rule.id}' (${rule.getBehavior()} ${rule.getAction()} on ${rule.getResource()}) applied`,
          decidedBy: rule.id,
          details: this.config.verbose
            ? this.explain(action, target, rules.length, rule.getBehavior())
            : undefined,
        };
        this.trace(decision, action, target.type);
        return decision;
      }
    }

    const decision: AuthorityDecision = {
      allowed: false,
      reason: 'No applicable rule, denying by default',
      decidedBy: 'default',
      details: this.config.verbose ? this.explain(action, target, rules.length) : undefined,
    };
    this.trace(decision, action, target.type);
    return decision;
  }

  /**
   * Define a privilege
   */
  allow(
    action: string,
    resource: ResourceArg<TValue>,
    condition?: Predicate<TUser, TValue> | null
  ): Rule<TUser, TValue> {
    return this.addRule('privilege', action, resource, condition);
  }

  /**
   * Define a restriction
   */
  deny(
    action: string,
    resource: ResourceArg<TValue>,
    condition?: Predicate<TUser, TValue> | null
  ): Rule<TUser, TValue> {
    return this.addRule('restriction', action, resource, condition);
  }

  /**
   * Create a rule and append it to the store.
   *
   * A value reference is reduced to its type name here, so the rule
   * matches every resource of that type.
   *
   * @throws UnresolvableResourceError when a value reference cannot be resolved
   * @throws RuleStoreLockedError under the 'lock' cache policy once lookups have happened
   */
  addRule(
    behavior: RuleBehavior,
    action: string,
    resource: ResourceArg<TValue>,
    condition?: Predicate<TUser, TValue> | null
  ): Rule<TUser, TValue> {
    const rule = new Rule<TUser, TValue>(
      `rule_${this.nextRuleId}`,
      behavior,
      action,
      this.resourceTypeFor(resource),
      condition
    );
    this.cache.beforeAdd(rule);
    this.rules.add(rule);
    this.nextRuleId++;
    return rule;
  }

  addAlias(name: string, actions: Iterable<string>): RuleAlias {
    const listed = [...actions];
    this.cache.beforeAliasChange(name, listed);
    return this.aliases.addAlias(name, listed);
  }

  setCurrentUser(currentUser: TUser): void {
    this.currentUser = currentUser;
  }

  setEventSink(eventSink: EventSink | null): void {
    this.eventSink = eventSink;
  }

  /**
   * Relevant rules for the action and resource, in addition order
   */
  getRulesFor(action: string, resource: ResourceArg<TValue>): readonly Rule<TUser, TValue>[] {
    const target = normalizeResource(resource, undefined, this.config.resolver);
    if (!target) {
      return [];
    }
    return this.relevantRules(action, target.type);
  }

  /**
   * All rules in addition order
   */
  getRules(): readonly Rule<TUser, TValue>[] {
    return this.rules.all();
  }

  /**
   * The action plus every alias name that lists it
   */
  getAliasesForAction(action: string): string[] {
    return this.aliases.expandForAction(action);
  }

  getAliases(): ReadonlyMap<string, RuleAlias> {
    return this.aliases.getAliases();
  }

  getAlias(name: string): RuleAlias | undefined {
    return this.aliases.getAlias(name);
  }

  /**
   * @throws AliasNotFoundError
   */
  requireAlias(name: string): RuleAlias {
    return this.aliases.requireAlias(name);
  }

  getCurrentUser(): TUser {
    return this.currentUser;
  }

  /**
   * Alias of getCurrentUser()
   */
  user(): TUser {
    return this.getCurrentUser();
  }

  /**
   * Drop every cached relevance entry
   */
  clearCache(): void {
    this.cache.clear();
  }

  getConfig(): Readonly<AuthorityConfig<TValue>> {
    return { ...this.config };
  }

  private relevantRules(action: string, resourceType: string): readonly Rule<TUser, TValue>[] {
    return this.cache.get(action, resourceType, () => this.aliases.expandForAction(action));
  }

  private resourceTypeFor(resource: ResourceArg<TValue>): string {
    const target = normalizeResource(resource, undefined, this.config.resolver);
    if (!target) {
      throw new UnresolvableResourceError('Rule resource value could not be resolved to a type name');
    }
    return target.type;
  }

  private createContext(action: string, resourceType: string): EvaluationContext<TUser, TValue> {
    return {
      authority: this,
      user: this.currentUser,
      action,
      resourceType,
    };
  }

  private explain(
    action: string,
    target: ResolvedResource<TValue>,
    relevantRules: number,
    behavior?: RuleBehavior
  ): Record<string, unknown> {
    return {
      actions: this.aliases.expandForAction(action),
      resourceType: target.type,
      hasValue: target.value !== undefined,
      relevantRules,
      ...(behavior && { behavior }),
    };
  }

  private trace(decision: AuthorityDecision, action: string, resourceType: string): void {
    if (!this.config.verbose) {
      return;
    }
    log.debug(decision.reason, {
      action,
      resourceType,
      ruleId: decision.decidedBy,
      allowed: decision.allowed,
    });
  }
}
