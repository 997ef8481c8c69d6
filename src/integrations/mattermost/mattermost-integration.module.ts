import { Module } from '@nestjs/common';

import { MattermostApiAdapter } from './mattermost-api.adapter';
import { CHAT_PLATFORM_PORT } from '../../core/ports/chat-platform/chat-platform-port.tokens';

@Module({
  providers: [
    MattermostApiAdapter,
    {
      provide: CHAT_PLATFORM_PORT,
      useExisting: MattermostApiAdapter,
    },
  ],
  exports: [CHAT_PLATFORM_PORT],
})
export class MattermostIntegrationModule {}
