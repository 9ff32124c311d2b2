import { ForbiddenException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/app.config';

const MINT_TOKEN = Symbol('admin-capability');

/**
 * Bukti bahwa pemanggil adalah admin.
 *
 * Hanya AdminAuthorizer yang bisa membuat object ini, jadi operasi admin
 * (cancel order, adjust saldo) cukup meminta AdminCapability sebagai
 * argumen dan tidak perlu mengecek daftar admin sendiri.
 */
export class AdminCapability {
  private readonly issued = MINT_TOKEN;

  constructor(
    token: symbol,
    readonly adminId: number,
  ) {
    if (token !== MINT_TOKEN) {
      throw new ForbiddenException('Akses admin ditolak');
    }
  }

  static verify(capability: AdminCapability): AdminCapability {
    if (!(capability instanceof AdminCapability) || capability.issued !== MINT_TOKEN) {
      throw new ForbiddenException('Akses admin ditolak');
    }
    return capability;
  }
}

@Injectable()
export class AdminAuthorizer {
  private readonly logger = new Logger(AdminAuthorizer.name);

  constructor(private configService: ConfigService) {}

  isAdmin(userId: number): boolean {
    return this.configService.getOrThrow<AppConfig>('app').adminUserIds.includes(userId);
  }

  /** Kembalikan capability untuk admin, null untuk user biasa */
  authorize(userId: number): AdminCapability | null {
    if (!this.isAdmin(userId)) {
      this.logger.warn(`User ${userId} attempted an admin operation`);
      return null;
    }
    return new AdminCapability(MINT_TOKEN, userId);
  }
}
