import { Module } from '@nestjs/common';

import { SlashCommandTokenGuard } from './auth/slash-command-token.guard';
import { SlashCommandController } from './controllers/slash-command.controller';
import { BotIdentityService } from './services/bot-identity.service';
import { MattermostBootstrapService } from './services/mattermost-bootstrap.service';
import { WhenToChatCommandService } from './services/when-to-chat-command.service';
import { MattermostIntegrationModule } from '../../integrations/mattermost/mattermost-integration.module';
import { ChatWindowModule } from '../chat-window/chat-window.module';

@Module({
  imports: [MattermostIntegrationModule, ChatWindowModule],
  controllers: [SlashCommandController],
  providers: [
    BotIdentityService,
    SlashCommandTokenGuard,
    WhenToChatCommandService,
    MattermostBootstrapService,
  ],
  exports: [BotIdentityService],
})
export class MattermostModule {}
