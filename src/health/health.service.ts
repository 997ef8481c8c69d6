import { Inject, Injectable } from '@nestjs/common';

import type { AppHealthStatus, ComponentHealth } from './health.types';
import { AppConfigService } from '../config/app-config.service';
import { CHAT_PLATFORM_PORT } from '../core/ports/chat-platform/chat-platform-port.tokens';
import type { IChatPlatformPort } from '../core/ports/chat-platform/chat-platform.interfaces';
import { BotIdentityService } from '../modules/mattermost/services/bot-identity.service';

@Injectable()
export class HealthService {
  public constructor(
    @Inject(AppConfigService) private readonly appConfigService: AppConfigService,
    @Inject(CHAT_PLATFORM_PORT) private readonly chatPlatform: IChatPlatformPort,
    @Inject(BotIdentityService) private readonly botIdentityService: BotIdentityService,
  ) {}

  public async getHealthStatus(): Promise<AppHealthStatus> {
    const mattermostChecksEnabled: boolean = this.appConfigService.mattermostEnabled;

    const mattermost: ComponentHealth = mattermostChecksEnabled
      ? await this.checkMattermost()
      : {
          ok: true,
          details: 'disabled by MATTERMOST_ENABLED=false',
        };

    const botUserId: string | null = this.botIdentityService.botUserId;
    const bot: ComponentHealth = mattermostChecksEnabled
      ? {
          ok: botUserId !== null,
          details: botUserId !== null ? `userId=${botUserId}` : 'bot identity not resolved',
        }
      : {
          ok: true,
          details: 'disabled by MATTERMOST_ENABLED=false',
        };

    return {
      status: mattermost.ok && bot.ok ? 'ok' : 'degraded',
      version: this.appConfigService.appVersion,
      mattermost,
      bot,
    };
  }

  private async checkMattermost(): Promise<ComponentHealth> {
    try {
      await this.chatPlatform.ping();

      return {
        ok: true,
        details: 'reachable',
      };
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        details: errorMessage,
      };
    }
  }
}
