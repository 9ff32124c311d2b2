import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/app.config';
import { InvalidTransitionException } from '../common/exceptions/domain.exceptions';
import { OrdersService } from './orders.service';

const SWEEP_BATCH_SIZE = 100;

/**
 * Order Expiry Job
 *
 * Timer background yang meng-expire order pending yang melewati batas
 * waktu pembayaran dan mengembalikan stoknya.
 *
 * - Satu putaran tidak pernah tumpang tindih dengan putaran lain
 * - Kegagalan satu order dicatat dan dicoba lagi di putaran berikutnya
 * - Order yang keburu dibayar (InvalidTransition) dianggap no-op
 */
@Injectable()
export class OrderExpiryJob implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(OrderExpiryJob.name);
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;

  constructor(
    private configService: ConfigService,
    private ordersService: OrdersService,
  ) {}

  private get paymentConfig(): AppConfig['payment'] {
    return this.configService.getOrThrow<AppConfig>('app').payment;
  }

  onApplicationBootstrap() {
    this.start();
  }

  onApplicationShutdown() {
    this.stop();
  }

  start(): void {
    if (this.intervalHandle) {
      this.logger.warn('Order expiry job already running');
      return;
    }

    const { sweepIntervalMs, expiryMinutes } = this.paymentConfig;
    this.logger.log(
      `Starting order expiry job (interval ${sweepIntervalMs}ms, payment window ${expiryMinutes}m)`,
    );

    this.intervalHandle = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error(
          'Order expiry sweep failed',
          error instanceof Error ? error.stack : String(error),
        );
      });
    }, sweepIntervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.logger.log('Order expiry job stopped');
    }
  }

  /**
   * Satu putaran sweep. Mengembalikan jumlah order yang benar-benar di-expire.
   */
  async sweep(now: Date = new Date()): Promise<number> {
    if (this.isRunning) {
      this.logger.debug('Expiry sweep already running, skipping');
      return 0;
    }

    this.isRunning = true;
    let expired = 0;
    let errors = 0;

    try {
      const cutoff = new Date(now.getTime() - this.paymentConfig.expiryMinutes * 60 * 1000);
      const overdue = this.ordersService.findExpirable(cutoff, SWEEP_BATCH_SIZE);
      if (overdue.length === 0) return 0;

      for (const order of overdue) {
        try {
          const result = await this.ordersService.markExpired(order.id, 'sweeper');
          if (result.changed) expired++;
        } catch (error) {
          if (error instanceof InvalidTransitionException) continue;
          errors++;
          this.logger.error(
            `Failed to expire order ${order.invoiceId}`,
            error instanceof Error ? error.stack : String(error),
          );
        }
      }

      this.logger.log(
        `Expiry sweep complete: ${overdue.length} overdue, ${expired} expired, ${errors} error(s)`,
      );
      return expired;
    } finally {
      this.isRunning = false;
    }
  }
}
