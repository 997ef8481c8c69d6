import { describe, expect, it, vi } from 'vitest';

import { BotIdentityService } from './bot-identity.service';
import { MattermostBootstrapService } from './mattermost-bootstrap.service';
import type { AppConfigService } from '../../../config/app-config.service';
import type { IChatPlatformPort } from '../../../core/ports/chat-platform/chat-platform.interfaces';

interface IAppConfigServiceStub {
  readonly mattermostEnabled: boolean;
  readonly mattermostCommandToken: string | null;
  readonly commandRegistrationEnabled: boolean;
  readonly mattermostTeamId: string | null;
  readonly commandCallbackUrl: string | null;
  readonly commandTrigger: string;
}

type ChatPlatformStub = {
  readonly getBotIdentity: ReturnType<typeof vi.fn>;
  readonly findTeamCommand: ReturnType<typeof vi.fn>;
  readonly registerCommand: ReturnType<typeof vi.fn>;
};

const createChatPlatformStub = (): ChatPlatformStub => ({
  getBotIdentity: vi.fn().mockResolvedValue({ userId: 'bot-1', username: 'whentochat' }),
  findTeamCommand: vi.fn().mockResolvedValue(null),
  registerCommand: vi.fn().mockResolvedValue({
    id: 'cmd-1',
    token: 'registered-token',
  }),
});

const createService = (
  overrides: Partial<IAppConfigServiceStub>,
  chatPlatform: ChatPlatformStub,
  botIdentityService: BotIdentityService,
): MattermostBootstrapService => {
  const appConfigServiceStub: IAppConfigServiceStub = {
    mattermostEnabled: true,
    mattermostCommandToken: null,
    commandRegistrationEnabled: false,
    mattermostTeamId: 'team-1',
    commandCallbackUrl: 'https://bot.example.test/mattermost/command',
    commandTrigger: 'whentochat',
    ...overrides,
  };

  return new MattermostBootstrapService(
    appConfigServiceStub as unknown as AppConfigService,
    chatPlatform as unknown as IChatPlatformPort,
    botIdentityService,
  );
};

describe('MattermostBootstrapService', (): void => {
  it('only accepts configured token when integration is disabled', async (): Promise<void> => {
    const chatPlatform: ChatPlatformStub = createChatPlatformStub();
    const botIdentityService: BotIdentityService = new BotIdentityService();
    const service: MattermostBootstrapService = createService(
      { mattermostEnabled: false, mattermostCommandToken: 'test-command-token' },
      chatPlatform,
      botIdentityService,
    );

    await service.onModuleInit();

    expect(chatPlatform.getBotIdentity).not.toHaveBeenCalled();
    expect(botIdentityService.isAcceptedToken('test-command-token')).toBe(true);
    expect(botIdentityService.botUserId).toBeNull();
  });

  it('resolves bot identity without registering when registration is off', async (): Promise<void> => {
    const chatPlatform: ChatPlatformStub = createChatPlatformStub();
    const botIdentityService: BotIdentityService = new BotIdentityService();
    const service: MattermostBootstrapService = createService({}, chatPlatform, botIdentityService);

    await service.onModuleInit();

    expect(botIdentityService.botUserId).toBe('bot-1');
    expect(chatPlatform.findTeamCommand).not.toHaveBeenCalled();
    expect(chatPlatform.registerCommand).not.toHaveBeenCalled();
    expect(botIdentityService.hasAcceptedTokens()).toBe(false);
  });

  it('registers command and accepts its token', async (): Promise<void> => {
    const chatPlatform: ChatPlatformStub = createChatPlatformStub();
    const botIdentityService: BotIdentityService = new BotIdentityService();
    const service: MattermostBootstrapService = createService(
      { commandRegistrationEnabled: true },
      chatPlatform,
      botIdentityService,
    );

    await service.onModuleInit();

    expect(chatPlatform.findTeamCommand).toHaveBeenCalledWith('team-1', 'whentochat');
    expect(chatPlatform.registerCommand).toHaveBeenCalledWith({
      teamId: 'team-1',
      trigger: 'whentochat',
      callbackUrl: 'https://bot.example.test/mattermost/command',
      displayName: 'When To Chat',
      description: 'Find a time to chat!',
      autoCompleteDescription: 'Find a time to chat!',
    });
    expect(botIdentityService.isAcceptedToken('registered-token')).toBe(true);
  });

  it('reuses existing team command instead of registering a duplicate', async (): Promise<void> => {
    const chatPlatform: ChatPlatformStub = createChatPlatformStub();
    chatPlatform.findTeamCommand.mockResolvedValue({
      id: 'cmd-existing',
      token: 'existing-token',
    });
    const botIdentityService: BotIdentityService = new BotIdentityService();
    const service: MattermostBootstrapService = createService(
      { commandRegistrationEnabled: true },
      chatPlatform,
      botIdentityService,
    );

    await service.onModuleInit();

    expect(chatPlatform.registerCommand).not.toHaveBeenCalled();
    expect(botIdentityService.isAcceptedToken('existing-token')).toBe(true);
  });

  it('fails startup when the token is not a bot account', async (): Promise<void> => {
    const chatPlatform: ChatPlatformStub = createChatPlatformStub();
    chatPlatform.getBotIdentity.mockRejectedValue(new Error('not a bot account'));
    const service: MattermostBootstrapService = createService(
      {},
      chatPlatform,
      new BotIdentityService(),
    );

    await expect(service.onModuleInit()).rejects.toThrow('not a bot account');
  });
});
