import { Module } from '@nestjs/common';
import { WalletService } from './wallet.service';
import { WalletController } from './wallet.controller';

/**
 * WalletModule
 *
 * Saldo akun user yang bisa dipakai untuk membayar order
 * tanpa biaya gateway. Setiap mutasi tercatat di wallet_transactions.
 */
@Module({
  controllers: [WalletController],
  providers: [WalletService],
  exports: [WalletService], // Dipakai OrdersService (debit) dan AdminModule (adjust)
})
export class WalletModule {}
