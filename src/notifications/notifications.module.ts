import { Global, Module } from '@nestjs/common';
import { NotificationsService } from './notifications.service';
import { CHAT_GATEWAY, LoggingChatGateway } from './chat-gateway';

@Global()
@Module({
  providers: [
    NotificationsService,
    { provide: CHAT_GATEWAY, useClass: LoggingChatGateway },
  ],
  exports: [NotificationsService],
})
export class NotificationsModule {}
