import { Module } from '@nestjs/common';

import { ChannelMembershipService } from './services/channel-membership.service';
import { ChatWindowFormatterService } from './services/chat-window-formatter.service';
import { TimezoneResolverService } from './services/timezone-resolver.service';
import { WindowIntersectorService } from './services/window-intersector.service';
import { MattermostIntegrationModule } from '../../integrations/mattermost/mattermost-integration.module';

@Module({
  imports: [MattermostIntegrationModule],
  providers: [
    TimezoneResolverService,
    WindowIntersectorService,
    ChatWindowFormatterService,
    ChannelMembershipService,
  ],
  exports: [
    TimezoneResolverService,
    WindowIntersectorService,
    ChatWindowFormatterService,
    ChannelMembershipService,
  ],
})
export class ChatWindowModule {}
