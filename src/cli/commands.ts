/**
 * CLI command bodies, kept apart from argument parsing.
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import type { AllowedTableSet } from '../types/models.js';
import { RoleSchema } from '../types/models.js';
import type { RbacResolver } from '../services/rbac.js';
import { validate } from '../services/validator.js';
import * as logger from './logger.js';

/**
 * Render the role policy as a table.
 */
export function renderRoles(rbac: RbacResolver): string {
  const table = new Table({
    head: [chalk.bold('Role'), chalk.bold('Tables')],
    style: { head: [], border: [] },
  });

  for (const { role, tables } of rbac.describe()) {
    table.push([role, tables.length > 0 ? tables.join(', ') : chalk.gray('(none)')]);
  }
  return table.toString();
}

export interface ValidateCommandOptions {
  role: string;
  maxLimit: number;
}

/**
 * Validate one statement for a role. Returns the process exit code.
 */
export function runValidate(sql: string, rbac: RbacResolver, options: ValidateCommandOptions): number {
  const role = RoleSchema.safeParse(options.role);
  if (!role.success) {
    logger.error(`Unknown role '${options.role}'`, `Use one of: ${RoleSchema.options.join(', ')}`);
    return 2;
  }
  if (!Number.isInteger(options.maxLimit) || options.maxLimit <= 0) {
    logger.error(`Invalid --max-limit '${options.maxLimit}'`, 'Use a positive integer');
    return 2;
  }

  const allowed: AllowedTableSet = rbac.resolve({ id: 'cli', displayName: 'cli', role: role.data });
  const result = validate(sql, allowed, options.maxLimit);

  if (!result.ok) {
    logger.error('Rejected', result.reason);
    return 1;
  }

  logger.success(`Accepted for role ${role.data}`);
  logger.code(result.statement.sql, 'sql');
  if (result.statement.tables.length > 0) {
    logger.info(`Tables: ${result.statement.tables.join(', ')}`);
  }
  return 0;
}
