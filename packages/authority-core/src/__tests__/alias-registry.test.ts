/**
 * Alias Registry Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AliasRegistry, RuleAlias } from '../alias-registry';
import { AliasNotFoundError } from '../errors';

describe('AliasRegistry', () => {
  let registry: AliasRegistry;

  beforeEach(() => {
    registry = new AliasRegistry();
  });

  describe('addAlias', () => {
    it('should register and return the alias', () => {
      const alias = registry.addAlias('manage', ['create', 'read', 'update', 'delete']);

      expect(alias).toBeInstanceOf(RuleAlias);
      expect(alias.name).toBe('manage');
      expect(alias.actions).toEqual(['create', 'read', 'update', 'delete']);
      expect(registry.getAlias('manage')).toBe(alias);
    });

    it('should drop duplicate actions', () => {
      const alias = registry.addAlias('edit', ['update', 'update', 'patch']);

      expect(alias.actions).toEqual(['update', 'patch']);
    });

    it('should replace an existing alias in place', () => {
      registry.addAlias('manage', ['read']);
      registry.addAlias('comment', ['read']);
      const replacement = registry.addAlias('manage', ['update']);

      expect(registry.getAlias('manage')).toBe(replacement);
      expect(Array.from(registry.getAliases().keys())).toEqual(['manage', 'comment']);
      expect(registry.expandForAction('read')).toEqual(['read', 'comment']);
      expect(registry.expandForAction('update')).toEqual(['update', 'manage']);
    });
  });

  describe('expandForAction', () => {
    it('should return the action followed by covering aliases', () => {
      registry.addAlias('manage', ['create', 'read', 'update', 'delete']);
      registry.addAlias('comment', ['read', 'comment']);

      expect(registry.expandForAction('read')).toEqual(['read', 'manage', 'comment']);
      expect(registry.expandForAction('delete')).toEqual(['delete', 'manage']);
    });

    it('should return only the action when no alias covers it', () => {
      registry.addAlias('manage', ['create']);

      expect(registry.expandForAction('explodeEverything')).toEqual(['explodeEverything']);
    });

    it('should not expand aliases transitively', () => {
      registry.addAlias('write', ['update']);
      registry.addAlias('admin', ['write']);

      expect(registry.expandForAction('update')).toEqual(['update', 'write']);
      expect(registry.expandForAction('write')).toEqual(['write', 'admin']);
    });
  });

  describe('lookups', () => {
    it('should return undefined for an unknown alias', () => {
      expect(registry.getAlias('missing')).toBeUndefined();
    });

    it('should throw AliasNotFoundError from requireAlias', () => {
      expect(() => registry.requireAlias('missing')).toThrow(AliasNotFoundError);
      expect(() => registry.requireAlias('missing')).toThrow("Alias 'missing' is not registered");
    });

    it('should return a snapshot of all aliases', () => {
      registry.addAlias('manage', ['read']);
      const snapshot = registry.getAliases();
      registry.addAlias('comment', ['read']);

      expect(snapshot.size).toBe(1);
      expect(registry.size).toBe(2);
    });
  });

  describe('RuleAlias', () => {
    it('should test direct membership', () => {
      const alias = new RuleAlias('comment', ['read', 'comment']);

      expect(alias.includes('comment')).toBe(true);
      expect(alias.includes('delete')).toBe(false);
    });
  });
});
