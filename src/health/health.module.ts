import { Module } from '@nestjs/common';

import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { MattermostIntegrationModule } from '../integrations/mattermost/mattermost-integration.module';
import { MattermostModule } from '../modules/mattermost/mattermost.module';

@Module({
  imports: [MattermostIntegrationModule, MattermostModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
