import { type INestApplication } from '@nestjs/common';
import { Test, type TestingModule } from '@nestjs/testing';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { AppModule } from '../src/app.module';
import { CHAT_PLATFORM_PORT } from '../src/core/ports/chat-platform/chat-platform-port.tokens';
import { ChatPlatformRequestError } from '../src/core/ports/chat-platform/chat-platform.errors';
import { buildChannelMember, manualZone } from './helpers/channel-member.fixture';
import { FakeChatPlatform } from './helpers/fake-chat-platform';
import { applyTestEnv } from './helpers/test-env';

const postCommand = async (
  baseUrl: string,
  fields: Readonly<Record<string, string>>,
): Promise<Response> =>
  fetch(`${baseUrl}/mattermost/command`, {
    method: 'POST',
    headers: {
      'content-type': 'application/x-www-form-urlencoded',
    },
    body: new URLSearchParams(fields).toString(),
  });

const commandFields = (overrides: Readonly<Record<string, string>> = {}): Record<string, string> => ({
  token: 'test-command-token',
  team_id: 'team-1',
  channel_id: 'channel-1',
  user_id: 'carol',
  command: '/whentochat',
  text: '',
  ...overrides,
});

describe('Slash command (e2e)', (): void => {
  let app: INestApplication;
  let baseUrl: string;
  const chatPlatform: FakeChatPlatform = new FakeChatPlatform();

  beforeAll(async (): Promise<void> => {
    applyTestEnv();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(CHAT_PLATFORM_PORT)
      .useValue(chatPlatform)
      .compile();

    app = moduleFixture.createNestApplication();
    await app.init();
    await app.listen(0);

    type HttpServerWithAddress = {
      address: () => {
        port: number;
      };
    };

    const httpServer: HttpServerWithAddress = app.getHttpServer() as HttpServerWithAddress;
    const serverAddress: { port: number } = httpServer.address();
    baseUrl = `http://127.0.0.1:${serverAddress.port.toString()}`;
  });

  beforeEach((): void => {
    chatPlatform.memberPageRequests = 0;
    chatPlatform.failWith(null);
    chatPlatform.setChannelMembers('channel-1', [
      buildChannelMember('alice', {
        firstName: 'Alice',
        lastName: 'Doe',
        timezone: manualZone('UTC'),
      }),
      buildChannelMember('carol', { firstName: 'Carol', timezone: manualZone('Etc/UTC') }),
      buildChannelMember('dave', { username: 'dave' }),
      buildChannelMember('helper-bot', { isBot: true, timezone: manualZone('Asia/Tokyo') }),
    ]);
  });

  afterAll(async (): Promise<void> => {
    await app.close().catch((): void => undefined);
  });

  it('answers with the window as an ephemeral reply to the invoker', async (): Promise<void> => {
    const response = await postCommand(baseUrl, commandFields());

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      response_type: 'ephemeral',
      text: [
        'It looks like the best times to chat are:',
        '- Carol: 7:00am - 10:00pm (UTC)',
        '- Alice Doe: 7:00am - 10:00pm (UTC)',
        '- dave: ?',
      ].join('\n'),
    });
  });

  it('rejects requests signed with a wrong token', async (): Promise<void> => {
    const response = await postCommand(baseUrl, commandFields({ token: 'wrong-token' }));

    expect(response.status).toBe(401);
    expect(chatPlatform.memberPageRequests).toBe(0);
  });

  it('rejects payloads without a channel', async (): Promise<void> => {
    const fields: Record<string, string> = commandFields();
    delete fields['channel_id'];

    const response = await postCommand(baseUrl, fields);

    expect(response.status).toBe(400);
  });

  it('stays silent for a different trigger', async (): Promise<void> => {
    const response = await postCommand(baseUrl, commandFields({ command: '/poll' }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({});
    expect(chatPlatform.memberPageRequests).toBe(0);
  });

  it('answers bad gateway when Mattermost fails', async (): Promise<void> => {
    chatPlatform.failWith(new ChatPlatformRequestError('list_channel_members', 'HTTP 500', 500));

    const response = await postCommand(baseUrl, commandFields());

    expect(response.status).toBe(502);
    expect(await response.json()).toMatchObject({
      statusCode: 502,
      message: 'Mattermost request failed: list_channel_members',
    });
  });

  it('/health (GET) reports resolved bot identity', async (): Promise<void> => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'ok',
      mattermost: { ok: true, details: 'reachable' },
      bot: { ok: true, details: 'userId=bot-user' },
    });
  });

  it('/metrics (GET) exposes command outcomes', async (): Promise<void> => {
    await postCommand(baseUrl, commandFields());

    const response = await fetch(`${baseUrl}/metrics`);
    const body: string = await response.text();

    expect(response.status).toBe(200);
    expect(body).toContain('slash_commands_total{outcome="window"}');
  });
});
