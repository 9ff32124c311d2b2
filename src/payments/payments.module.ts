import { Module, forwardRef } from '@nestjs/common';
import { PaymentsService } from './payments.service';
import { WebhookService } from './webhook.service';
import { PaymentsController } from './payments.controller';
import { OrdersModule } from '../orders/orders.module';

/**
 * PaymentsModule
 *
 * Integrasi dengan payment gateway QRIS:
 * - PaymentsService: health check, create payment, poll status, checkout URL
 * - WebhookService: memproses notifikasi gateway secara idempotent
 *
 * PaymentsService dipakai CheckoutService di OrdersModule, sementara
 * WebhookService butuh OrdersService, jadi kedua module saling import.
 */
@Module({
  imports: [forwardRef(() => OrdersModule)],
  controllers: [PaymentsController],
  providers: [PaymentsService, WebhookService],
  exports: [PaymentsService],
})
export class PaymentsModule {}
