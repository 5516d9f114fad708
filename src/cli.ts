#!/usr/bin/env node
/**
 * querygate CLI
 */

import { cac } from 'cac';
import { config } from './config.js';
import { DEFAULT_ROLE_POLICY, loadRolePolicy, RbacResolver } from './services/rbac.js';
import { startServer } from './server.js';
import { renderRoles, runValidate } from './cli/commands.js';
import * as logger from './cli/logger.js';

const cli = cac('querygate');

cli.version('1.0.0');
cli.help();

function createRbac(): RbacResolver {
  const policy = config.RBAC_POLICY_PATH ? loadRolePolicy(config.RBAC_POLICY_PATH) : DEFAULT_ROLE_POLICY;
  return new RbacResolver(policy, config.ENABLE_RBAC);
}

/**
 * querygate serve
 * Start the HTTP API
 */
cli
  .command('serve', 'Start the API server')
  .option('-p, --port <port>', 'Server port', { default: config.PORT })
  .action(async (options: { port: number | string }) => {
    logger.printBanner();
    const port = Number(options.port);
    if (!Number.isInteger(port) || port <= 0) {
      logger.error(`Invalid port '${options.port}'`);
      process.exit(2);
    }

    try {
      await startServer(config, port);
      logger.link('API docs', `http://localhost:${port}/docs`);
    } catch (error) {
      logger.error('Failed to start server', String(error));
      process.exit(1);
    }
  });

/**
 * querygate validate "<sql>"
 * Run the safety checks without touching a database
 */
cli
  .command('validate <sql>', 'Validate a SQL statement for a role')
  .option('-r, --role <role>', 'Role to validate for', { default: 'analyst' })
  .option('--max-limit <n>', 'Row limit to inject', { default: config.MAX_LIMIT })
  .action((sql: string, options: { role: string; maxLimit: number | string }) => {
    const code = runValidate(sql, createRbac(), {
      role: String(options.role),
      maxLimit: Number(options.maxLimit),
    });
    process.exitCode = code;
  });

/**
 * querygate roles
 * Print the role → table policy
 */
cli
  .command('roles', 'Show the role policy')
  .action(() => {
    logger.section('Role policy');
    console.log(renderRoles(createRbac()));
  });

cli.parse();
