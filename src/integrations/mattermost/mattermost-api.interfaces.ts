import type { z } from 'zod';

import type {
  mattermostCommandSchema,
  mattermostUserSchema,
} from './mattermost-api.schemas';

export enum MattermostOperation {
  LIST_CHANNEL_MEMBERS = 'list_channel_members',
  GET_BOT_IDENTITY = 'get_bot_identity',
  LIST_TEAM_COMMANDS = 'list_team_commands',
  REGISTER_COMMAND = 'register_command',
  PING = 'ping',
}

export type MattermostUserPayload = z.infer<typeof mattermostUserSchema>;

export type MattermostCommandPayload = z.infer<typeof mattermostCommandSchema>;

export interface IMattermostRequestInit {
  readonly method: 'GET' | 'POST';
  readonly body?: unknown;
}
