export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly mattermostEnabled: boolean;
  readonly mattermostUrl: string | null;
  readonly mattermostBotToken: string | null;
  readonly mattermostTimeoutMs: number;
  readonly mattermostCommandToken: string | null;
  readonly mattermostTeamId: string | null;
  readonly commandTrigger: string;
  readonly commandRegistrationEnabled: boolean;
  readonly commandCallbackUrl: string | null;
  readonly maxChannelMembers: number;
  readonly metricsEnabled: boolean;
};
