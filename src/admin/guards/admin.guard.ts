import {
  CanActivate,
  createParamDecorator,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import type { Request } from 'express';
import { readActorId } from '../../common/decorators/actor-id.decorator';
import { AdminAuthorizer } from '../admin-capability';
import type { AdminCapability } from '../admin-capability';

export interface AdminRequest extends Request {
  adminCapability?: AdminCapability;
}

@Injectable()
export class AdminGuard implements CanActivate {
  constructor(private adminAuthorizer: AdminAuthorizer) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AdminRequest>();

    // Guard ini berjalan SETELAH ApiKeyGuard (global),
    // jadi request sudah pasti datang dari front end.
    const capability = this.adminAuthorizer.authorize(readActorId(request));
    if (!capability) {
      throw new ForbiddenException('Akses ditolak. Hanya untuk administrator.');
    }

    request.adminCapability = capability;
    return true;
  }
}

/** Capability yang dipasang AdminGuard */
export const GetAdmin = createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
  const capability = ctx.switchToHttp().getRequest<AdminRequest>().adminCapability;
  if (!capability) {
    throw new ForbiddenException('Akses ditolak. Hanya untuk administrator.');
  }
  return capability;
});
