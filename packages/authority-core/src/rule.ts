/**
 * Rule
 *
 * A privilege or restriction for one action on one resource type, gated by
 * zero or more predicates. Rules only grow through `when`; everything else
 * is fixed at construction.
 */

import {
  ALL_RESOURCES,
  type ActionMatcher,
  type EvaluationContext,
  type Predicate,
  type RuleBehavior,
} from './types';

function isActionList(actions: readonly string[] | ReadonlySet<string>): actions is readonly string[] {
  return Array.isArray(actions);
}

export class Rule<TUser = unknown, TValue = unknown> {
  readonly id: string;
  private readonly behavior: RuleBehavior;
  private readonly action: string;
  private readonly resource: string;
  private readonly conditions: Predicate<TUser, TValue>[] = [];

  /**
   * @param id - Engine-assigned identifier
   * @param behavior - Privilege or restriction
   * @param action - Raw action name (aliases are matched by name, not expanded here)
   * @param resource - Resource type name, or 'all'
   * @param condition - Optional initial predicate
   */
  constructor(
    id: string,
    behavior: RuleBehavior,
    action: string,
    resource: string,
    condition?: Predicate<TUser, TValue> | null
  ) {
    this.id = id;
    this.behavior = behavior;
    this.action = action;
    this.resource = resource;
    this.addCondition(condition);
  }

  /**
   * Whether every condition holds (AND). A rule without conditions always applies.
   */
  applies(context: EvaluationContext<TUser, TValue>, resourceValue?: TValue): boolean {
    return this.conditions.every((condition) => condition(context, resourceValue));
  }

  /**
   * True if this rule is a privilege and it applies
   */
  isAllowed(context: EvaluationContext<TUser, TValue>, resourceValue?: TValue): boolean {
    return this.isPrivilege() && this.applies(context, resourceValue);
  }

  /**
   * True if this rule is a restriction and it applies
   */
  isDisallowed(context: EvaluationContext<TUser, TValue>, resourceValue?: TValue): boolean {
    return this.isRestriction() && this.applies(context, resourceValue);
  }

  isRelevant(action: ActionMatcher, resourceType: string): boolean {
    return this.matchesAction(action) && this.matchesResource(resourceType);
  }

  /**
   * Exact match against one action name, or membership in a set of names
   */
  matchesAction(action: ActionMatcher): boolean {
    if (typeof action === 'string') {
      return this.action === action;
    }
    if (isActionList(action)) {
      return action.includes(this.action);
    }
    return action.has(this.action);
  }

  matchesResource(resourceType: string): boolean {
    return this.resource === resourceType || this.resource === ALL_RESOURCES;
  }

  /**
   * Append a condition. Null and undefined are ignored.
   */
  when(condition: Predicate<TUser, TValue> | null | undefined): this {
    return this.addCondition(condition);
  }

  addCondition(condition: Predicate<TUser, TValue> | null | undefined): this {
    if (condition) {
      this.conditions.push(condition);
    }
    return this;
  }

  isPrivilege(): boolean {
    return this.behavior === 'privilege';
  }

  isRestriction(): boolean {
    return this.behavior === 'restriction';
  }

  getAction(): string {
    return this.action;
  }

  getBehavior(): RuleBehavior {
    return this.behavior;
  }

  getResource(): string {
    return this.resource;
  }

  getConditions(): readonly Predicate<TUser, TValue>[] {
    return [...this.conditions];
  }
}
