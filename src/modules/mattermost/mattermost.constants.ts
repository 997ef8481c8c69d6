export const COMMAND_DISPLAY_NAME = 'When To Chat';
export const COMMAND_DESCRIPTION = 'Find a time to chat!';
export const SLASH_COMMAND_ROUTE = 'mattermost/command';
