export interface IMemberTimezonePreference {
  readonly useAutomaticTimezone?: string;
  readonly automaticTimezone?: string;
  readonly manualTimezone?: string;
}

export interface IChannelMember {
  readonly id: string;
  readonly username: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly isBot: boolean;
  readonly timezone: IMemberTimezonePreference;
}

export interface IBotIdentity {
  readonly userId: string;
  readonly username: string;
}

export interface ISlashCommandDefinition {
  readonly teamId: string;
  readonly trigger: string;
  readonly callbackUrl: string;
  readonly displayName: string;
  readonly description: string;
  readonly autoCompleteDescription: string;
}

export interface IRegisteredCommand {
  readonly id: string;
  readonly token: string;
}

export interface IChatPlatformPort {
  listChannelMembers(
    channelId: string,
    page: number,
    perPage: number,
  ): Promise<readonly IChannelMember[]>;
  getBotIdentity(): Promise<IBotIdentity>;
  findTeamCommand(teamId: string, trigger: string): Promise<IRegisteredCommand | null>;
  registerCommand(definition: ISlashCommandDefinition): Promise<IRegisteredCommand>;
  ping(): Promise<void>;
}
