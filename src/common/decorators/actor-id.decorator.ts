import {
  BadRequestException,
  createParamDecorator,
  ExecutionContext,
} from '@nestjs/common';
import type { Request } from 'express';

export const ACTOR_HEADER = 'x-user-id';

/**
 * Ambil ID user (ID platform chat) dari header X-User-Id.
 * Header ini diisi oleh front end bot yang sudah lolos X-Api-Key.
 */
export function readActorId(request: Request): number {
  const raw = request.headers[ACTOR_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const userId = Number(value);

  if (!value || !Number.isSafeInteger(userId) || userId <= 0) {
    throw new BadRequestException('Header X-User-Id wajib berisi ID user yang valid');
  }
  return userId;
}

export const ActorId = createParamDecorator((_data: unknown, ctx: ExecutionContext) =>
  readActorId(ctx.switchToHttp().getRequest<Request>()),
);
