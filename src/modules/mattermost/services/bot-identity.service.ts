import { Injectable } from '@nestjs/common';

import type { IBotIdentity } from '../../../core/ports/chat-platform/chat-platform.interfaces';

/**
 * Startup state shared across invocations: the bot account that posts replies and
 * the slash command tokens Mattermost signs requests with.
 */
@Injectable()
export class BotIdentityService {
  private botIdentity: IBotIdentity | null = null;
  private readonly acceptedTokens: Set<string> = new Set<string>();

  public get botUserId(): string | null {
    return this.botIdentity?.userId ?? null;
  }

  public setIdentity(identity: IBotIdentity): void {
    this.botIdentity = identity;
  }

  public addAcceptedToken(token: string): void {
    const normalizedToken: string = token.trim();

    if (normalizedToken.length > 0) {
      this.acceptedTokens.add(normalizedToken);
    }
  }

  public hasAcceptedTokens(): boolean {
    return this.acceptedTokens.size > 0;
  }

  public isAcceptedToken(token: string): boolean {
    return this.acceptedTokens.has(token.trim());
  }
}
