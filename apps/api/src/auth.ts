// Authentication and authorization against the external identity service

import axios, { AxiosInstance } from 'axios';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { SYSTEM_USER_ID, errorMessage, logger } from '@vidgen/core';
import { AuthError, errorBody } from './responses.js';
import { RoutePermission, RoutePermissionTable } from './route-permissions.js';

export interface Principal {
  id: string;
  tenant_id: string;
  is_system_key: boolean; // tenant-wide access
}

export const SYSTEM_PRINCIPAL: Principal = {
  id: SYSTEM_USER_ID,
  tenant_id: SYSTEM_USER_ID,
  is_system_key: true,
};

export type Credentials = { scheme: 'bearer'; token: string } | { scheme: 'apikey'; key: string };

/** `Authorization: Bearer`, `Authorization: ApiKey`, or `X-Api-Key`. */
export function extractCredentials(req: Request): Credentials | undefined {
  const authorization = req.get('authorization')?.trim();
  if (authorization) {
    const [scheme, value] = authorization.split(/\s+/, 2);
    if (value && scheme.toLowerCase() === 'bearer') return { scheme: 'bearer', token: value };
    if (value && scheme.toLowerCase() === 'apikey') return { scheme: 'apikey', key: value };
  }
  const apiKey = req.get('x-api-key')?.trim();
  return apiKey ? { scheme: 'apikey', key: apiKey } : undefined;
}

const VerifyResponseSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  results: z.unknown().optional(),
});

const IdentitySchema = z.object({
  id: z.string().optional(),
  user_id: z.string().optional(),
  tenant_id: z.string().min(1),
  is_system_key: z.boolean().optional(),
  key_type: z.string().optional(),
});

export interface AuthVerifierOptions {
  baseUrl: string;
  serviceName: string;
  timeoutMs?: number;
  http?: Pick<AxiosInstance, 'post'>;
}

export class AuthVerifier {
  private readonly http: Pick<AxiosInstance, 'post'>;

  constructor(private readonly options: AuthVerifierOptions) {
    this.http = options.http ?? axios.create();
  }

  async verify(credentials: Credentials, permission?: RoutePermission): Promise<Principal> {
    const endpoint =
      credentials.scheme === 'bearer' ? '/api/v1/auth/verify-token' : '/api/v1/auth/verify-api-key';
    const body = {
      ...(credentials.scheme === 'bearer' ? { token: credentials.token } : { key: credentials.key }),
      service: this.options.serviceName,
      ...(permission ? { resource: permission.resource, action: permission.action } : {}),
    };

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(`${this.options.baseUrl.replace(/\/+$/, '')}${endpoint}`, body, {
        timeout: this.options.timeoutMs ?? 5_000,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      logger.error(`Identity service request failed: ${errorMessage(error)}`);
      throw new AuthError(503, 'Authentication service unavailable');
    }

    const parsed = VerifyResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthError(401, 'Invalid authentication response');
    }
    const { success, message = 'Unknown error', results } = parsed.data;

    if (status !== 200 || success !== true) {
      logger.warn(`Credential verification rejected (HTTP ${status}): ${message}`);
      if (permission && status === 403) {
        throw new AuthError(403, `Insufficient permissions: ${message}`);
      }
      throw new AuthError(401, `Invalid authentication credentials: ${message}`);
    }

    const identity = IdentitySchema.safeParse(results);
    if (!identity.success) {
      throw new AuthError(401, 'Invalid authentication response');
    }
    const { id, user_id, tenant_id, is_system_key, key_type } = identity.data;
    const systemKey = credentials.scheme === 'apikey' ? key_type === 'system' : is_system_key === true;
    return {
      id: id ?? user_id ?? SYSTEM_USER_ID,
      tenant_id,
      is_system_key: systemKey,
    };
  }
}

export interface AuthMiddlewareOptions {
  enabled: boolean;
  verifier: AuthVerifier;
  permissions?: RoutePermissionTable;
}

/**
 * Resolve the caller and check the route's permission. The principal is left
 * on `res.locals.principal`.
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions): RequestHandler {
  const permissions = options.permissions ?? new RoutePermissionTable();

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!options.enabled) {
      res.locals.principal = SYSTEM_PRINCIPAL;
      next();
      return;
    }

    const credentials = extractCredentials(req);
    if (!credentials) {
      res
        .status(401)
        .setHeader('WWW-Authenticate', 'Bearer, ApiKey')
        .json(errorBody('Missing authentication credentials'));
      return;
    }

    const permission = permissions.find(req.method, req.originalUrl.split('?')[0]);
    options.verifier
      .verify(credentials, permission)
      .then(principal => {
        res.locals.principal = principal;
        next();
      })
      .catch((error: unknown) => {
        const status = error instanceof AuthError ? error.status : 500;
        res.status(status).json(errorBody(errorMessage(error)));
      });
  };
}

export function isPrincipal(value: unknown): value is Principal {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'tenant_id' in value &&
    typeof value.tenant_id === 'string' &&
    'is_system_key' in value &&
    typeof value.is_system_key === 'boolean'
  );
}

/** The principal set by the auth stage. */
export function principalOf(res: Response): Principal {
  const principal: unknown = res.locals.principal;
  if (!isPrincipal(principal)) {
    throw new AuthError(401, 'Request was not authenticated');
  }
  return principal;
}
