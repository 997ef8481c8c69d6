import { Inject, Injectable, Logger } from '@nestjs/common';

import { AppConfigService } from '../../../config/app-config.service';
import { ChatPlatformRequestError } from '../../../core/ports/chat-platform/chat-platform.errors';
import type { IChannelMember } from '../../../core/ports/chat-platform/chat-platform.interfaces';
import { MetricsService } from '../../../observability/metrics.service';
import {
  type ChannelMembershipResult,
  ChannelMembershipStatus,
  type IResolvedMember,
  type SharedWindow,
} from '../../chat-window/entities/chat-window.interfaces';
import { ChannelMembershipService } from '../../chat-window/services/channel-membership.service';
import { ChatWindowFormatterService } from '../../chat-window/services/chat-window-formatter.service';
import { arrangeMemberFirst } from '../../chat-window/services/member-order.util';
import { TimezoneResolverService } from '../../chat-window/services/timezone-resolver.service';
import { WindowIntersectorService } from '../../chat-window/services/window-intersector.service';
import {
  type ISlashCommandInvocation,
  type SlashCommandResult,
  SlashCommandOutcome,
} from '../entities/slash-command.interfaces';

type ComposedReply = Extract<SlashCommandResult, { readonly message: string }>;

@Injectable()
export class WhenToChatCommandService {
  private readonly logger: Logger = new Logger(WhenToChatCommandService.name);

  public constructor(
    @Inject(AppConfigService) private readonly appConfigService: AppConfigService,
    @Inject(ChannelMembershipService)
    private readonly channelMembershipService: ChannelMembershipService,
    @Inject(TimezoneResolverService)
    private readonly timezoneResolverService: TimezoneResolverService,
    @Inject(WindowIntersectorService)
    private readonly windowIntersectorService: WindowIntersectorService,
    @Inject(ChatWindowFormatterService)
    private readonly chatWindowFormatterService: ChatWindowFormatterService,
    @Inject(MetricsService) private readonly metricsService: MetricsService,
  ) {}

  public async execute(
    invocation: ISlashCommandInvocation,
    now: Date = new Date(),
  ): Promise<SlashCommandResult> {
    const trigger: string = `/${this.appConfigService.commandTrigger}`;
    const invokedTrigger: string = invocation.command.trim().split(/\s+/)[0] ?? '';

    if (invokedTrigger !== trigger) {
      this.logger.debug(
        `ignoring command channelId=${invocation.channelId} command=${invokedTrigger}`,
      );
      this.metricsService.slashCommandsTotal.inc({ outcome: SlashCommandOutcome.IGNORED });

      return { outcome: SlashCommandOutcome.IGNORED, message: null };
    }

    try {
      const reply: ComposedReply = await this.composeReply(invocation, now);

      this.metricsService.slashCommandsTotal.inc({ outcome: reply.outcome });
      this.logger.log(
        `command handled channelId=${invocation.channelId} userId=${invocation.userId} outcome=${reply.outcome}`,
      );

      return reply;
    } catch (error: unknown) {
      this.metricsService.slashCommandsTotal.inc({ outcome: SlashCommandOutcome.FAILED });

      if (error instanceof ChatPlatformRequestError) {
        this.logger.warn(
          `command failed channelId=${invocation.channelId} userId=${invocation.userId} reason=${error.message}`,
        );
      }

      throw error;
    }
  }

  private async composeReply(
    invocation: ISlashCommandInvocation,
    now: Date,
  ): Promise<ComposedReply> {
    const membership: ChannelMembershipResult =
      await this.channelMembershipService.listHumanMembers(
        invocation.channelId,
        this.appConfigService.snapshot.maxChannelMembers,
      );

    if (membership.status === ChannelMembershipStatus.OVER_CAP) {
      return {
        outcome: SlashCommandOutcome.OVER_CAP,
        message: this.chatWindowFormatterService.formatOverCap(),
      };
    }

    const orderedMembers: IChannelMember[] = arrangeMemberFirst(
      invocation.userId,
      membership.members,
    );
    const resolvedMembers: readonly IResolvedMember[] =
      this.timezoneResolverService.annotate(orderedMembers);
    const sharedWindow: SharedWindow = this.windowIntersectorService.computeSharedWindow(
      resolvedMembers,
      now,
    );

    if (!sharedWindow.hasOverlap) {
      return {
        outcome: SlashCommandOutcome.NO_WINDOW,
        message: this.chatWindowFormatterService.formatNoWindow(),
      };
    }

    return {
      outcome: SlashCommandOutcome.WINDOW,
      message: this.chatWindowFormatterService.formatWindow(sharedWindow, resolvedMembers),
    };
  }
}
