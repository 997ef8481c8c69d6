import { Inject, Injectable, Logger, type OnModuleInit } from '@nestjs/common';

import { BotIdentityService } from './bot-identity.service';
import { AppConfigService } from '../../../config/app-config.service';
import { CHAT_PLATFORM_PORT } from '../../../core/ports/chat-platform/chat-platform-port.tokens';
import type {
  IBotIdentity,
  IChatPlatformPort,
  IRegisteredCommand,
} from '../../../core/ports/chat-platform/chat-platform.interfaces';
import { COMMAND_DESCRIPTION, COMMAND_DISPLAY_NAME } from '../mattermost.constants';

@Injectable()
export class MattermostBootstrapService implements OnModuleInit {
  private readonly logger: Logger = new Logger(MattermostBootstrapService.name);

  public constructor(
    @Inject(AppConfigService) private readonly appConfigService: AppConfigService,
    @Inject(CHAT_PLATFORM_PORT) private readonly chatPlatform: IChatPlatformPort,
    @Inject(BotIdentityService) private readonly botIdentityService: BotIdentityService,
  ) {}

  public async onModuleInit(): Promise<void> {
    const configuredToken: string | null = this.appConfigService.mattermostCommandToken;

    if (configuredToken !== null) {
      this.botIdentityService.addAcceptedToken(configuredToken);
    }

    if (!this.appConfigService.mattermostEnabled) {
      this.logger.log('Mattermost integration disabled, skipping bot bootstrap');
      return;
    }

    const identity: IBotIdentity = await this.chatPlatform.getBotIdentity();
    this.botIdentityService.setIdentity(identity);
    this.logger.log(`Bot identity resolved userId=${identity.userId} username=${identity.username}`);

    if (!this.appConfigService.commandRegistrationEnabled) {
      return;
    }

    const command: IRegisteredCommand = await this.ensureCommandRegistered();
    this.botIdentityService.addAcceptedToken(command.token);
  }

  private async ensureCommandRegistered(): Promise<IRegisteredCommand> {
    const teamId: string | null = this.appConfigService.mattermostTeamId;
    const callbackUrl: string | null = this.appConfigService.commandCallbackUrl;

    if (teamId === null || callbackUrl === null) {
      throw new Error('Command registration requires MATTERMOST_TEAM_ID and COMMAND_CALLBACK_URL');
    }

    const trigger: string = this.appConfigService.commandTrigger;
    const existingCommand: IRegisteredCommand | null = await this.chatPlatform.findTeamCommand(
      teamId,
      trigger,
    );

    if (existingCommand !== null) {
      this.logger.log(
        `Slash command already registered teamId=${teamId} trigger=${trigger} commandId=${existingCommand.id}`,
      );
      return existingCommand;
    }

    const registeredCommand: IRegisteredCommand = await this.chatPlatform.registerCommand({
      teamId,
      trigger,
      callbackUrl,
      displayName: COMMAND_DISPLAY_NAME,
      description: COMMAND_DESCRIPTION,
      autoCompleteDescription: COMMAND_DESCRIPTION,
    });
    this.logger.log(
      `Slash command registered teamId=${teamId} trigger=${trigger} commandId=${registeredCommand.id}`,
    );

    return registeredCommand;
  }
}
