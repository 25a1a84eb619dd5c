/**
 * Resource references and type resolution
 */

import { UnresolvableResourceError } from './errors';
import type { ResolvedResource, ResourceArg, ResourceRef, ResourceTypeResolver } from './types';

/**
 * Reference a resource by type name
 */
export function typeRef(name: string): ResourceRef<never> {
  return { kind: 'type', name };
}

/**
 * Reference a concrete resource; its type name comes from the resolver
 */
export function valueRef<TValue>(value: TValue): ResourceRef<TValue> {
  return { kind: 'value', value };
}

/**
 * Built-in resolver: the value's constructor name.
 *
 * Primitives resolve to their `typeof` name. Null, undefined and objects
 * without a named constructor (e.g. `Object.create(null)`) are unresolvable.
 *
 * @example
 * ```typescript
 * class User {}
 * constructorNameResolver(new User()); // 'User'
 * constructorNameResolver({ id: 2 }); // 'Object'
 * ```
 */
export function constructorNameResolver(value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' && typeof value !== 'function') {
    return typeof value;
  }

  const prototype: object | null = Object.getPrototypeOf(value);
  if (prototype === null) {
    return undefined;
  }
  const constructor: unknown = Reflect.get(prototype, 'constructor');
  if (typeof constructor !== 'function' || !constructor.name) {
    return undefined;
  }
  return constructor.name;
}

/**
 * Normalize a resource argument into a type name plus optional value.
 *
 * A type reference keeps the separately supplied value. A value reference
 * is resolved and its own value becomes the resource value.
 *
 * @returns null when the resolver cannot name the type
 */
export function normalizeResource<TValue>(
  resource: ResourceArg<TValue>,
  resourceValue: TValue | undefined,
  resolver: ResourceTypeResolver<TValue>
): ResolvedResource<TValue> | null {
  if (typeof resource === 'string') {
    return { type: resource, value: resourceValue };
  }
  if (resource.kind === 'type') {
    return { type: resource.name, value: resourceValue };
  }

  let type: string | undefined;
  try {
    type = resolver(resource.value);
  } catch (error) {
    if (error instanceof UnresolvableResourceError) {
      return null;
    }
    throw error;
  }

  if (!type) {
    return null;
  }
  return { type, value: resource.value };
}
