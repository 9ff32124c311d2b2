import { Injectable, Logger } from '@nestjs/common';

export const CHAT_GATEWAY = Symbol('CHAT_GATEWAY');

/**
 * Port ke platform chat (bot). Rendering pesan dan keyboard ada di luar
 * core ini; yang dibutuhkan core hanya kemampuan "kirim pesan ke user".
 */
export interface ChatGateway {
  sendMessage(userId: number, text: string): Promise<void>;
}

/**
 * Implementasi default: hanya menulis log. Proses bot mengganti provider
 * ini dengan adapter platform chat yang sebenarnya.
 */
@Injectable()
export class LoggingChatGateway implements ChatGateway {
  private readonly logger = new Logger(LoggingChatGateway.name);

  async sendMessage(userId: number, text: string): Promise<void> {
    this.logger.log(`[chat:${userId}] ${text.split('\n')[0]}`);
  }
}
