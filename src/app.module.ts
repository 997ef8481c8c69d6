import { Module } from '@nestjs/common';

import { ConfigModule } from './config/config.module';
import { HealthModule } from './health/health.module';
import { ChatWindowModule } from './modules/chat-window/chat-window.module';
import { MattermostModule } from './modules/mattermost/mattermost.module';
import { ObservabilityModule } from './observability/observability.module';

@Module({
  imports: [ConfigModule, ObservabilityModule, ChatWindowModule, MattermostModule, HealthModule],
})
export class AppModule {}
