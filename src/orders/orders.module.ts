import { Module, forwardRef } from '@nestjs/common';
import { OrdersService } from './orders.service';
import { CheckoutService } from './checkout.service';
import { OrdersController } from './orders.controller';
import { OrderExpiryJob } from './order-expiry.job';
import { OrderNotificationListener } from './listeners/order-notification.listener';
import { InventoryModule } from '../inventory/inventory.module';
import { WalletModule } from '../wallet/wallet.module';
import { PaymentsModule } from '../payments/payments.module';

/**
 * Orders Module
 *
 * Lifecycle pesanan stok digital:
 *
 * 1. Checkout - order dibuat dan stok direservasi dalam satu transaksi
 * 2. Pembayaran - QRIS via gateway atau potong saldo akun
 * 3. Settlement - webhook/poll/saldo menandai order paid, produk dikirim
 * 4. Expiry - order yang tidak dibayar di-expire dan stok dikembalikan
 * 5. Cancel - oleh pembeli atau admin
 *
 * Satu user hanya boleh punya satu order pending. Semua transisi status
 * berupa compare-and-set sehingga webhook ganda atau balapan dengan
 * sweeper tidak pernah menjual satu unit ke dua pembeli.
 */
@Module({
  imports: [InventoryModule, WalletModule, forwardRef(() => PaymentsModule)],
  controllers: [OrdersController],
  providers: [OrdersService, CheckoutService, OrderExpiryJob, OrderNotificationListener],
  exports: [OrdersService],
})
export class OrdersModule {}
