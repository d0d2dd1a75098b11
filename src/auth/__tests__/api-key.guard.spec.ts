import { UnauthorizedException, type ExecutionContext } from '@nestjs/common';

import { loadActivityConfig } from '../../config/activity.config.js';
import { ApiKeyGuard, extractApiKey } from '../api-key.guard.js';

const contextWith = (headers: Record<string, string>): ExecutionContext =>
  ({ switchToHttp: () => ({ getRequest: () => ({ headers }) }) }) as unknown as ExecutionContext;

describe('extractApiKey', () => {
  it('reads the X-API-Key header first', () => {
    expect(extractApiKey({ headers: { 'x-api-key': ' test-secret ', authorization: 'Bearer other' } })).toBe(
      'test-secret',
    );
  });

  it('falls back to a bearer token', () => {
    expect(extractApiKey({ headers: { authorization: 'Bearer test-secret' } })).toBe('test-secret');
    expect(extractApiKey({ headers: { authorization: 'Basic abc' } })).toBeUndefined();
  });
});

describe('ApiKeyGuard', () => {
  it('lets everything through outside production', () => {
    const guard = new ApiKeyGuard(loadActivityConfig({}));
    expect(guard.canActivate(contextWith({}))).toBe(true);
  });

  it('checks the key in production', () => {
    const guard = new ApiKeyGuard(loadActivityConfig({ NODE_ENV: 'production', API_KEY: 'test-secret' }));

    expect(guard.canActivate(contextWith({ 'x-api-key': 'test-secret' }))).toBe(true);
    expect(() => guard.canActivate(contextWith({}))).toThrow(new UnauthorizedException('Missing API key'));
    expect(() => guard.canActivate(contextWith({ 'x-api-key': 'wrong' }))).toThrow('Invalid API key');
  });

  it('refuses to run in production without a configured key', () => {
    const guard = new ApiKeyGuard(loadActivityConfig({ NODE_ENV: 'production' }));
    expect(() => guard.canActivate(contextWith({ 'x-api-key': 'test-secret' }))).toThrow(
      'API_KEY environment variable is not configured',
    );
  });
});
