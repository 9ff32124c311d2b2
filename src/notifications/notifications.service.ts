import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import type { AppConfig } from '../config/app.config';
import { CHAT_GATEWAY } from './chat-gateway';
import type { ChatGateway } from './chat-gateway';

/**
 * NotificationsService
 *
 * Dua kanal keluar:
 * 1. Pesan ke pembeli lewat ChatGateway (pengiriman produk, order expired, dll)
 * 2. Alert ke admin lewat email (SMTP) untuk kondisi yang butuh tindakan manual,
 *    misalnya log audit pembayaran yang gagal ditulis.
 *
 * Kegagalan kirim pesan ke pembeli tidak pernah membatalkan transaksi; error
 * cukup dicatat di log.
 */
@Injectable()
export class NotificationsService implements OnModuleInit {
  private readonly logger = new Logger(NotificationsService.name);
  private transporter: nodemailer.Transporter | null = null;
  private alertRecipient: string | null = null;

  constructor(
    private configService: ConfigService,
    @Inject(CHAT_GATEWAY) private chatGateway: ChatGateway,
  ) {}

  async onModuleInit() {
    const { smtp } = this.configService.getOrThrow<AppConfig>('app');

    if (!smtp.host || !smtp.alertRecipient) {
      this.logger.warn('SMTP not configured. Admin alerts will only be written to the log.');
      return;
    }

    this.alertRecipient = smtp.alertRecipient;
    this.transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure,
      auth: smtp.user ? { user: smtp.user, pass: smtp.password } : undefined,
    });

    try {
      await this.transporter.verify();
      this.logger.log('SMTP server ready: admin alerts are enabled');
    } catch (error) {
      this.logger.error(
        'SMTP connection error: admin alerts will fall back to the log',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  async notifyBuyer(userId: number, content: string): Promise<boolean> {
    try {
      await this.chatGateway.sendMessage(userId, content);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to deliver message to user ${userId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return false;
    }
  }

  /**
   * Kirim alert ke admin. Selalu ditulis ke log level error,
   * dan juga dikirim via email kalau SMTP tersedia.
   */
  async notifyAdmins(subject: string, content: string): Promise<void> {
    this.logger.error(`[ADMIN ALERT] ${subject}: ${content}`);

    if (!this.transporter || !this.alertRecipient) return;

    try {
      await this.transporter.sendMail({
        from: `"Store Alerts" <${this.alertRecipient}>`,
        to: this.alertRecipient,
        subject: `[ALERT] ${subject}`,
        text: content,
      });
    } catch (error) {
      this.logger.error(
        `Failed to send admin alert email "${subject}"`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
