/**
 * Role-based access control: role → visible tables.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { AuthorizationDenied } from '../types/errors.js';
import {
  ROLES,
  RolePolicySchema,
  type AllowedTableSet,
  type Principal,
  type Role,
  type RolePolicy,
  type SchemaMap,
} from '../types/models.js';
import { logger } from '../utils/logger.js';

const WILDCARD = '*';

export const ALL_TABLES: AllowedTableSet = Object.freeze({ kind: 'all' });

/**
 * Built-in role → table mapping.
 */
export const DEFAULT_ROLE_POLICY: RolePolicy = {
  analyst: ['sales', 'users', 'orders'],
  admin: [WILDCARD],
  readonly: ['sales', 'users'],
};

export type AuthorizationResult = { ok: true } | { ok: false; reason: string };

/**
 * Resolves principals to allowed table sets against a static policy.
 * Stateless after construction.
 */
export class RbacResolver {
  private readonly allowed = new Map<Role, AllowedTableSet>();

  /**
   * @param enabled - when false every principal is treated as unrestricted
   */
  constructor(
    policy: RolePolicy = DEFAULT_ROLE_POLICY,
    private readonly enabled: boolean = true
  ) {
    for (const role of ROLES) {
      const tables = policy[role];
      if (!tables) continue;
      this.allowed.set(
        role,
        tables.includes(WILDCARD)
          ? ALL_TABLES
          : { kind: 'tables', tables: new Set(tables.map((t) => t.toLowerCase())) }
      );
    }
  }

  /**
   * Tables the principal may see. A role without a policy entry gets an
   * empty set, never full access.
   */
  resolve(principal: Principal): AllowedTableSet {
    if (!this.enabled) {
      return ALL_TABLES;
    }
    return this.allowed.get(principal.role) ?? { kind: 'tables', tables: new Set() };
  }

  /**
   * Check that every named table is visible to the principal.
   */
  authorize(principal: Principal, tableNames: readonly string[]): AuthorizationResult {
    const allowed = this.resolve(principal);
    if (allowed.kind === 'all') {
      return { ok: true };
    }

    for (const table of tableNames) {
      if (!allowed.tables.has(table.toLowerCase())) {
        return {
          ok: false,
          reason: `User '${principal.displayName}' is not authorized to access table '${table}'`,
        };
      }
    }
    return { ok: true };
  }

  /**
   * Like `authorize`, but raises AuthorizationDenied.
   */
  assertAuthorized(principal: Principal, tableNames: readonly string[]): void {
    const result = this.authorize(principal, tableNames);
    if (!result.ok) {
      throw new AuthorizationDenied(result.reason);
    }
  }

  /**
   * Restrict a schema to the allowed tables. This is what the SQL generator
   * gets to see.
   */
  filterSchema(schema: SchemaMap, allowed: AllowedTableSet): SchemaMap {
    if (allowed.kind === 'all') {
      return schema;
    }
    return Object.freeze(
      Object.fromEntries(
        Object.entries(schema).filter(([table]) => allowed.tables.has(table.toLowerCase()))
      )
    );
  }

  /**
   * Policy as a printable list.
   */
  describe(): Array<{ role: Role; tables: string[] }> {
    return ROLES.map((role) => {
      const allowed = this.enabled ? this.allowed.get(role) : ALL_TABLES;
      if (!allowed) return { role, tables: [] };
      return { role, tables: allowed.kind === 'all' ? [WILDCARD] : [...allowed.tables].sort() };
    });
  }
}

/**
 * Read a role policy from a JSON file.
 */
export function loadRolePolicy(path: string): RolePolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new Error(`Could not read role policy from ${path}: ${error}`);
  }

  try {
    const policy = RolePolicySchema.parse(raw);
    logger.info(`Loaded role policy for ${Object.keys(policy).length} roles from ${path}`);
    return policy;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Invalid role policy in ${path}: ${issues.join('; ')}`);
    }
    throw error;
  }
}
