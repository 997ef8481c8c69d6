import { Inject, Injectable, Logger } from '@nestjs/common';
import type { z } from 'zod';

import {
  type IMattermostRequestInit,
  type MattermostCommandPayload,
  MattermostOperation,
  type MattermostUserPayload,
} from './mattermost-api.interfaces';
import {
  mattermostCommandListSchema,
  mattermostCommandSchema,
  mattermostErrorSchema,
  mattermostPingSchema,
  mattermostUserListSchema,
  mattermostUserSchema,
} from './mattermost-api.schemas';
import { AppConfigService } from '../../config/app-config.service';
import { ChatPlatformRequestError } from '../../core/ports/chat-platform/chat-platform.errors';
import type {
  IBotIdentity,
  IChannelMember,
  IChatPlatformPort,
  IRegisteredCommand,
  ISlashCommandDefinition,
} from '../../core/ports/chat-platform/chat-platform.interfaces';
import { MetricsService } from '../../observability/metrics.service';

const API_PREFIX = '/api/v4';
const PING_STATUS_OK = 'OK';

@Injectable()
export class MattermostApiAdapter implements IChatPlatformPort {
  private readonly logger: Logger = new Logger(MattermostApiAdapter.name);

  public constructor(
    @Inject(AppConfigService) private readonly appConfigService: AppConfigService,
    @Inject(MetricsService) private readonly metricsService: MetricsService,
  ) {}

  public async listChannelMembers(
    channelId: string,
    page: number,
    perPage: number,
  ): Promise<readonly IChannelMember[]> {
    const users: readonly MattermostUserPayload[] = await this.request(
      MattermostOperation.LIST_CHANNEL_MEMBERS,
      '/users',
      { in_channel: channelId, page: String(page), per_page: String(perPage) },
      { method: 'GET' },
      mattermostUserListSchema,
    );

    return users.map((user: MattermostUserPayload): IChannelMember => this.mapChannelMember(user));
  }

  public async getBotIdentity(): Promise<IBotIdentity> {
    const user: MattermostUserPayload = await this.request(
      MattermostOperation.GET_BOT_IDENTITY,
      '/users/me',
      {},
      { method: 'GET' },
      mattermostUserSchema,
    );

    if (!user.is_bot) {
      throw new Error(
        `MATTERMOST_BOT_TOKEN belongs to user ${user.username}, which is not a bot account`,
      );
    }

    return {
      userId: user.id,
      username: user.username,
    };
  }

  public async findTeamCommand(
    teamId: string,
    trigger: string,
  ): Promise<IRegisteredCommand | null> {
    const commands: readonly MattermostCommandPayload[] = await this.request(
      MattermostOperation.LIST_TEAM_COMMANDS,
      '/commands',
      { team_id: teamId, custom_only: 'true' },
      { method: 'GET' },
      mattermostCommandListSchema,
    );
    const existingCommand: MattermostCommandPayload | undefined = commands.find(
      (command: MattermostCommandPayload): boolean =>
        command.trigger === trigger && command.delete_at === 0,
    );

    return existingCommand ? this.mapRegisteredCommand(existingCommand) : null;
  }

  public async registerCommand(definition: ISlashCommandDefinition): Promise<IRegisteredCommand> {
    const command: MattermostCommandPayload = await this.request(
      MattermostOperation.REGISTER_COMMAND,
      '/commands',
      {},
      {
        method: 'POST',
        body: {
          team_id: definition.teamId,
          trigger: definition.trigger,
          method: 'P',
          url: definition.callbackUrl,
          display_name: definition.displayName,
          description: definition.description,
          auto_complete: true,
          auto_complete_desc: definition.autoCompleteDescription,
        },
      },
      mattermostCommandSchema,
    );

    return this.mapRegisteredCommand(command);
  }

  public async ping(): Promise<void> {
    const pingResult: z.infer<typeof mattermostPingSchema> = await this.request(
      MattermostOperation.PING,
      '/system/ping',
      {},
      { method: 'GET' },
      mattermostPingSchema,
    );

    if (pingResult.status !== PING_STATUS_OK) {
      throw new ChatPlatformRequestError(
        MattermostOperation.PING,
        `server reported status ${pingResult.status}`,
      );
    }
  }

  private async request<T>(
    operation: MattermostOperation,
    path: string,
    query: Readonly<Record<string, string>>,
    init: IMattermostRequestInit,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const baseUrl: string | null = this.appConfigService.mattermostUrl;
    const botToken: string | null = this.appConfigService.mattermostBotToken;

    if (baseUrl === null || botToken === null) {
      throw new ChatPlatformRequestError(operation, 'Mattermost connection is not configured');
    }

    const url: URL = new URL(`${baseUrl}${API_PREFIX}${path}`);

    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    this.logger.debug(`${operation} request method=${init.method} path=${url.pathname}`);

    const stopTimer: () => number = this.metricsService.chatPlatformRequestDurationSeconds.startTimer(
      { operation },
    );
    let response: Response;

    try {
      response = await fetch(url, {
        method: init.method,
        headers: this.buildHeaders(botToken, init.body !== undefined),
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: AbortSignal.timeout(this.appConfigService.mattermostTimeoutMs),
      });
    } catch (error: unknown) {
      stopTimer();
      this.metricsService.chatPlatformRequestsTotal.inc({ operation, status: 'network_error' });
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${operation} request failed: ${errorMessage}`);
      throw new ChatPlatformRequestError(operation, errorMessage, null, { cause: error });
    }

    stopTimer();
    this.metricsService.chatPlatformRequestsTotal.inc({
      operation,
      status: response.ok ? 'ok' : `http_${String(response.status)}`,
    });

    if (!response.ok) {
      const errorDetail: string = await this.readErrorDetail(response);
      this.logger.warn(
        `${operation} returned HTTP ${String(response.status)} detail="${errorDetail}"`,
      );
      throw new ChatPlatformRequestError(
        operation,
        `HTTP ${String(response.status)}: ${errorDetail}`,
        response.status,
      );
    }

    return this.parsePayload(operation, response, schema);
  }

  private async parsePayload<T>(
    operation: MattermostOperation,
    response: Response,
    schema: z.ZodType<T>,
  ): Promise<T> {
    let payload: unknown;

    try {
      payload = await response.json();
    } catch (error: unknown) {
      throw new ChatPlatformRequestError(operation, 'response is not valid JSON', response.status, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(payload);

    if (!parsed.success) {
      const issues: string = parsed.error.issues
        .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ChatPlatformRequestError(
        operation,
        `invalid response payload: ${issues}`,
        response.status,
      );
    }

    return parsed.data;
  }

  private async readErrorDetail(response: Response): Promise<string> {
    try {
      const payload: unknown = await response.json();
      const parsed = mattermostErrorSchema.safeParse(payload);

      if (parsed.success) {
        return parsed.data.message;
      }
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.debug(`error body is not JSON: ${errorMessage}`);
    }

    return response.statusText.length > 0
      ? response.statusText
      : 'no error details';
  }

  private buildHeaders(botToken: string, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      accept: 'application/json',
      authorization: `Bearer ${botToken}`,
    };

    if (hasBody) {
      headers['content-type'] = 'application/json';
    }

    return headers;
  }

  private mapChannelMember(user: MattermostUserPayload): IChannelMember {
    const automaticFlag: string | boolean | undefined = user.timezone.useAutomaticTimezone;

    return {
      id: user.id,
      username: user.username,
      firstName: user.first_name,
      lastName: user.last_name,
      isBot: user.is_bot,
      timezone: {
        useAutomaticTimezone: automaticFlag === undefined ? undefined : String(automaticFlag),
        automaticTimezone: user.timezone.automaticTimezone,
        manualTimezone: user.timezone.manualTimezone,
      },
    };
  }

  private mapRegisteredCommand(command: MattermostCommandPayload): IRegisteredCommand {
    return {
      id: command.id,
      token: command.token,
    };
  }
}
