import type { ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapMattermostConfig(parsedEnv),
  ...mapCommandConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'appVersion' | 'nodeEnv' | 'port' | 'logLevel' | 'metricsEnabled'> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
});

const mapMattermostConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'mattermostEnabled'
  | 'mattermostUrl'
  | 'mattermostBotToken'
  | 'mattermostTimeoutMs'
  | 'mattermostCommandToken'
  | 'mattermostTeamId'
> => ({
  mattermostEnabled: parsedEnv.MATTERMOST_ENABLED,
  mattermostUrl: parsedEnv.MATTERMOST_URL ? trimTrailingSlashes(parsedEnv.MATTERMOST_URL) : null,
  mattermostBotToken: parsedEnv.MATTERMOST_BOT_TOKEN ?? null,
  mattermostTimeoutMs: parsedEnv.MATTERMOST_TIMEOUT_MS,
  mattermostCommandToken: parsedEnv.MATTERMOST_COMMAND_TOKEN ?? null,
  mattermostTeamId: parsedEnv.MATTERMOST_TEAM_ID ?? null,
});

const mapCommandConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  'commandTrigger' | 'commandRegistrationEnabled' | 'commandCallbackUrl' | 'maxChannelMembers'
> => ({
  commandTrigger: parsedEnv.COMMAND_TRIGGER,
  commandRegistrationEnabled: parsedEnv.COMMAND_REGISTRATION_ENABLED,
  commandCallbackUrl: parsedEnv.COMMAND_CALLBACK_URL ?? null,
  maxChannelMembers: parsedEnv.MAX_CHANNEL_MEMBERS,
});

const trimTrailingSlashes = (url: string): string => url.replace(/\/+$/, '');
