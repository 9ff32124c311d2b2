import { Controller, Get, Query } from '@nestjs/common';
import { ActorId } from '../common/decorators/actor-id.decorator';
import { WalletService } from './wallet.service';
import { WalletTransactionQueryDto } from './dto/wallet.dto';

/**
 * WalletController
 *
 * Endpoints:
 * - GET /wallet/balance      - Saldo akun user
 * - GET /wallet/transactions - Riwayat mutasi saldo
 */
@Controller('wallet')
export class WalletController {
  constructor(private readonly walletService: WalletService) {}

  /**
   * Get saldo
   * GET /api/wallet/balance
   */
  @Get('balance')
  getBalance(@ActorId() userId: number) {
    return {
      success: true,
      data: { balance: this.walletService.getBalance(userId) },
    };
  }

  @Get('transactions')
  getTransactions(@ActorId() userId: number, @Query() query: WalletTransactionQueryDto) {
    return {
      success: true,
      data: this.walletService.getTransactions(userId, query.limit),
    };
  }
}
