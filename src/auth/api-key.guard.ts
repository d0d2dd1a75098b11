import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';

import { ACTIVITY_CONFIG } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';

/** Accepts `X-API-Key: <key>` or `Authorization: Bearer <key>`. */
export function extractApiKey(request: Pick<FastifyRequest, 'headers'>): string | undefined {
  const first = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

  const apiKey = first(request.headers['x-api-key'])?.trim();
  if (apiKey) return apiKey;

  const auth = first(request.headers['authorization']);
  if (auth?.startsWith('Bearer ')) return auth.slice(7).trim() || undefined;

  return undefined;
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(@Inject(ACTIVITY_CONFIG) private readonly config: ActivityConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const { requireApiKey, apiKey: expected } = this.config.server;
    if (!requireApiKey) return true;

    if (!expected) {
      throw new Error('API_KEY environment variable is not configured');
    }

    const provided = extractApiKey(context.switchToHttp().getRequest<FastifyRequest>());
    if (!provided) throw new UnauthorizedException('Missing API key');
    if (provided !== expected) throw new UnauthorizedException('Invalid API key');
    return true;
  }
}
