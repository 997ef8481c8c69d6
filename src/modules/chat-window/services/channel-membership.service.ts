import { Inject, Injectable, Logger } from '@nestjs/common';

import { CHAT_PLATFORM_PORT } from '../../../core/ports/chat-platform/chat-platform-port.tokens';
import type {
  IChannelMember,
  IChatPlatformPort,
} from '../../../core/ports/chat-platform/chat-platform.interfaces';
import { MetricsService } from '../../../observability/metrics.service';
import {
  CHANNEL_MEMBERS_PAGE_SIZE,
  type ChannelMembershipResult,
  ChannelMembershipStatus,
} from '../entities/chat-window.interfaces';

@Injectable()
export class ChannelMembershipService {
  private readonly logger: Logger = new Logger(ChannelMembershipService.name);

  public constructor(
    @Inject(CHAT_PLATFORM_PORT) private readonly chatPlatform: IChatPlatformPort,
    @Inject(MetricsService) private readonly metricsService: MetricsService,
  ) {}

  public async listHumanMembers(
    channelId: string,
    maxMembers: number,
  ): Promise<ChannelMembershipResult> {
    const members: IChannelMember[] = [];
    let page: number = 0;

    for (;;) {
      const pageMembers: readonly IChannelMember[] = await this.chatPlatform.listChannelMembers(
        channelId,
        page,
        CHANNEL_MEMBERS_PAGE_SIZE,
      );

      for (const member of pageMembers) {
        if (!member.isBot) {
          members.push(member);
        }
      }

      this.logger.debug(
        `channel page fetched channelId=${channelId} page=${String(page)} pageSize=${String(
          pageMembers.length,
        )} humans=${String(members.length)}`,
      );

      if (members.length > maxMembers) {
        this.logger.log(
          `channel over member cap channelId=${channelId} fetched=${String(
            members.length,
          )} cap=${String(maxMembers)}`,
        );

        return {
          status: ChannelMembershipStatus.OVER_CAP,
          fetchedCount: members.length,
        };
      }

      if (pageMembers.length < CHANNEL_MEMBERS_PAGE_SIZE) {
        break;
      }

      page += 1;
    }

    this.metricsService.channelMembersConsidered.observe(members.length);

    return {
      status: ChannelMembershipStatus.COMPLETE,
      members,
    };
  }
}
