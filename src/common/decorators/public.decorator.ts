import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/** Endpoint yang tidak butuh X-Api-Key (webhook gateway, health check) */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
