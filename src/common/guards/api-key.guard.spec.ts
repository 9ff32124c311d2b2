import { UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { buildAppConfig } from '../../config/app.config';
import { TEST_ENV } from '../../testing/test-app';
import { Public } from '../decorators/public.decorator';
import { ApiKeyGuard } from './api-key.guard';

class SampleController {
  @Public()
  webhook() {
    return 'ok';
  }

  balance() {
    return 'ok';
  }
}

describe('ApiKeyGuard', () => {
  const guard = new ApiKeyGuard(
    new Reflector(),
    new ConfigService({ app: buildAppConfig(TEST_ENV) }),
  );

  function contextFor(handler: () => string, headers: Record<string, string> = {}) {
    const request = { method: 'GET', url: '/api/test', headers };
    return new ExecutionContextHost([request, {}, () => undefined], SampleController, handler);
  }

  it('lets public handlers through without a key', () => {
    expect(guard.canActivate(contextFor(SampleController.prototype.webhook))).toBe(true);
  });

  it('accepts the configured key', () => {
    expect(
      guard.canActivate(
        contextFor(SampleController.prototype.balance, { 'x-api-key': 'test-internal-api-key' }),
      ),
    ).toBe(true);
  });

  it.each([
    ['missing', {}],
    ['wrong', { 'x-api-key': 'wrong-internal-api-key' }],
    ['shorter', { 'x-api-key': 'test' }],
  ])('rejects a %s key', (_label, headers: Record<string, string>) => {
    expect(() => guard.canActivate(contextFor(SampleController.prototype.balance, headers))).toThrow(
      UnauthorizedException,
    );
  });
});
