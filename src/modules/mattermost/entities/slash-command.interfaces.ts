export enum SlashCommandOutcome {
  WINDOW = 'window',
  NO_WINDOW = 'no_window',
  OVER_CAP = 'over_cap',
  IGNORED = 'ignored',
  FAILED = 'failed',
}

export interface ISlashCommandInvocation {
  readonly teamId: string;
  readonly channelId: string;
  readonly userId: string;
  readonly command: string;
  readonly text: string;
}

export type SlashCommandResult =
  | {
      readonly outcome: SlashCommandOutcome.IGNORED;
      readonly message: null;
    }
  | {
      readonly outcome: Exclude<SlashCommandOutcome, SlashCommandOutcome.IGNORED>;
      readonly message: string;
    };

export enum SlashCommandResponseType {
  EPHEMERAL = 'ephemeral',
}

export interface ISlashCommandResponse {
  readonly response_type?: SlashCommandResponseType;
  readonly text?: string;
}
