import type { ParsedEnv } from './app-config.schema';

export function assertMattermostConfig(parsedEnv: ParsedEnv): void {
  assertConnectionConfig(parsedEnv);
  assertRegistrationConfig(parsedEnv);
}

function assertConnectionConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.MATTERMOST_ENABLED) {
    if (!parsedEnv.MATTERMOST_URL) {
      throw new Error('MATTERMOST_URL is required when MATTERMOST_ENABLED=true');
    }

    if (!parsedEnv.MATTERMOST_BOT_TOKEN) {
      throw new Error('MATTERMOST_BOT_TOKEN is required when MATTERMOST_ENABLED=true');
    }

    if (!parsedEnv.COMMAND_REGISTRATION_ENABLED && !parsedEnv.MATTERMOST_COMMAND_TOKEN) {
      throw new Error(
        'MATTERMOST_COMMAND_TOKEN is required when MATTERMOST_ENABLED=true and COMMAND_REGISTRATION_ENABLED=false',
      );
    }
  }
}

function assertRegistrationConfig(parsedEnv: ParsedEnv): void {
  if (!parsedEnv.COMMAND_REGISTRATION_ENABLED) {
    return;
  }

  if (!parsedEnv.MATTERMOST_ENABLED) {
    throw new Error('COMMAND_REGISTRATION_ENABLED=true requires MATTERMOST_ENABLED=true');
  }

  if (!parsedEnv.MATTERMOST_TEAM_ID) {
    throw new Error('MATTERMOST_TEAM_ID is required when COMMAND_REGISTRATION_ENABLED=true');
  }

  if (!parsedEnv.COMMAND_CALLBACK_URL) {
    throw new Error('COMMAND_CALLBACK_URL is required when COMMAND_REGISTRATION_ENABLED=true');
  }
}
