/**
 * Alias Registry
 *
 * Named groups of actions. An alias name shares the action namespace: a
 * rule written for `manage` is relevant to a `read` query whenever the
 * `manage` alias lists `read`.
 */

import { AliasNotFoundError } from './errors';

export class RuleAlias {
  readonly name: string;
  readonly actions: readonly string[];

  constructor(name: string, actions: Iterable<string>) {
    this.name = name;
    this.actions = Array.from(new Set(actions));
  }

  /**
   * Whether the alias directly lists the action
   */
  includes(action: string): boolean {
    return this.actions.includes(action);
  }
}

export class AliasRegistry {
  private readonly aliases = new Map<string, RuleAlias>();

  /**
   * Register an alias. Re-registering a name replaces its definition in
   * place; rules already created keep their raw action strings.
   */
  addAlias(name: string, actions: Iterable<string>): RuleAlias {
    const alias = new RuleAlias(name, actions);
    this.aliases.set(name, alias);
    return alias;
  }

  /**
   * The action followed by every alias name that lists it, in registration order.
   *
   * Expansion is one level deep: aliases listing another alias name are
   * not followed transitively.
   *
   * @example
   * ```typescript
   * registry.addAlias('manage', ['create', 'read', 'update', 'delete']);
   * registry.addAlias('comment', ['read', 'comment']);
   * registry.expandForAction('read'); // ['read', 'manage', 'comment']
   * ```
   */
  expandForAction(action: string): string[] {
    const actions = [action];
    for (const [name, alias] of this.aliases) {
      if (alias.includes(action)) {
        actions.push(name);
      }
    }
    return actions;
  }

  getAlias(name: string): RuleAlias | undefined {
    return this.aliases.get(name);
  }

  requireAlias(name: string): RuleAlias {
    const alias = this.aliases.get(name);
    if (!alias) {
      throw new AliasNotFoundError(name);
    }
    return alias;
  }

  getAliases(): ReadonlyMap<string, RuleAlias> {
    return new Map(this.aliases);
  }

  get size(): number {
    return this.aliases.size;
  }
}
