import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

export const SLASH_COMMAND_BODY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    token: { type: 'string', example: 'command-token' },
    team_id: { type: 'string', example: 'team-id' },
    channel_id: { type: 'string', example: 'channel-id' },
    user_id: { type: 'string', example: 'user-id' },
    command: { type: 'string', example: '/whentochat' },
    text: { type: 'string', example: '' },
  },
  required: ['channel_id', 'user_id', 'command'],
};

export const SLASH_COMMAND_RESPONSE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    response_type: { type: 'string', example: 'ephemeral' },
    text: {
      type: 'string',
      example: 'It looks like the best times to chat are:\n- alice: 9:00am - 5:00pm (UTC)',
    },
  },
  description: 'Empty object when the trigger does not match',
};
