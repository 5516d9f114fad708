/**
 * RBAC Resolver Unit Tests
 */

import { describe, it, expect, afterAll } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadRolePolicy, RbacResolver } from '../src/services/rbac.js';
import { AuthorizationDenied } from '../src/types/errors.js';
import type { Principal, Role } from '../src/types/models.js';

function principal(role: Role, displayName: string = 'alice'): Principal {
  return { id: 'u1', displayName, role };
}

describe('RbacResolver', () => {
  const rbac = new RbacResolver();

  describe('resolve', () => {
    it('should map analyst to its tables', () => {
      const allowed = rbac.resolve(principal('analyst'));
      expect(allowed.kind).toBe('tables');
      if (allowed.kind === 'tables') {
        expect([...allowed.tables].sort()).toEqual(['orders', 'sales', 'users']);
      }
    });

    it('should give admin every table', () => {
      expect(rbac.resolve(principal('admin'))).toEqual({ kind: 'all' });
    });

    it('should give a role without a policy entry nothing', () => {
      const partial = new RbacResolver({ analyst: ['sales'] });
      const allowed = partial.resolve(principal('readonly'));
      expect(allowed.kind).toBe('tables');
      if (allowed.kind === 'tables') {
        expect(allowed.tables.size).toBe(0);
      }
    });

    it('should give everyone every table when disabled', () => {
      const disabled = new RbacResolver(undefined, false);
      expect(disabled.resolve(principal('readonly'))).toEqual({ kind: 'all' });
    });
  });

  describe('authorize', () => {
    it('should accept visible tables regardless of case', () => {
      expect(rbac.authorize(principal('readonly'), ['SALES', 'users'])).toEqual({ ok: true });
    });

    it('should name the first table that is not visible', () => {
      expect(rbac.authorize(principal('readonly'), ['sales', 'orders'])).toEqual({
        ok: false,
        reason: "User 'alice' is not authorized to access table 'orders'",
      });
    });

    it('should raise AuthorizationDenied from assertAuthorized', () => {
      expect(() => rbac.assertAuthorized(principal('readonly'), ['orders'])).toThrow(AuthorizationDenied);
    });
  });

  describe('filterSchema', () => {
    const schema = { sales: ['id'], users: ['id', 'name'], secrets: ['token'] };

    it('should drop tables the principal cannot see', () => {
      const filtered = rbac.filterSchema(schema, rbac.resolve(principal('readonly')));
      expect(filtered).toEqual({ sales: ['id'], users: ['id', 'name'] });
    });

    it('should keep everything for admin', () => {
      expect(rbac.filterSchema(schema, rbac.resolve(principal('admin')))).toEqual(schema);
    });
  });

  it('should describe the policy', () => {
    expect(rbac.describe()).toEqual([
      { role: 'analyst', tables: ['orders', 'sales', 'users'] },
      { role: 'admin', tables: ['*'] },
      { role: 'readonly', tables: ['sales', 'users'] },
    ]);
  });
});

describe('loadRolePolicy', () => {
  const dir = mkdtempSync(join(tmpdir(), 'querygate-rbac-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the bundled policy file', () => {
    const policy = loadRolePolicy(join(__dirname, '..', 'config', 'roles.json'));
    expect(policy.readonly).toEqual(['sales', 'users']);
    expect(policy.admin).toEqual(['*']);
  });

  it('should reject unknown roles', () => {
    const path = join(dir, 'bad.json');
    writeFileSync(path, JSON.stringify({ superuser: ['sales'] }));
    expect(() => loadRolePolicy(path)).toThrow(/Invalid role policy/);
  });

  it('should report unreadable files', () => {
    expect(() => loadRolePolicy(join(dir, 'missing.json'))).toThrow(/Could not read role policy/);
  });
});
