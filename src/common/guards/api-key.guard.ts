import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { Request } from 'express';
import type { AppConfig } from '../../config/app.config';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';

/**
 * Guard global: semua endpoint butuh header X-Api-Key milik front end,
 * kecuali yang ditandai @Public().
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);

  constructor(
    private reflector: Reflector,
    private configService: ConfigService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context.switchToHttp().getRequest<Request>();
    const provided = request.headers['x-api-key'];
    const expected = this.configService.getOrThrow<AppConfig>('app').internalApiKey;

    if (typeof provided !== 'string' || !this.matches(provided, expected)) {
      this.logger.warn(`Rejected request to ${request.method} ${request.url}: invalid API key`);
      throw new UnauthorizedException('API key tidak valid');
    }
    return true;
  }

  private matches(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
  }
}
