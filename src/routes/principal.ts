/**
 * Request principal, read from the x-user-id / x-username / x-role headers.
 */

import type { FastifyRequest } from 'fastify';
import { AuthorizationDenied } from '../types/errors.js';
import { PrincipalHeadersSchema, type Principal } from '../types/models.js';

export function resolvePrincipal(request: FastifyRequest): Principal {
  const parsed = PrincipalHeadersSchema.safeParse(request.headers);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new AuthorizationDenied(`Invalid principal headers: ${fields}`);
  }

  const headers = parsed.data;
  return {
    id: headers['x-user-id'],
    displayName: headers['x-username'],
    role: headers['x-role'],
  };
}

export function requireAdmin(principal: Principal): void {
  if (principal.role !== 'admin') {
    throw new AuthorizationDenied(`User '${principal.displayName}' requires the admin role for this action`);
  }
}
