import {
  type CanActivate,
  type ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';

import { AppConfigService } from '../../../config/app-config.service';
import { BotIdentityService } from '../services/bot-identity.service';

@Injectable()
export class SlashCommandTokenGuard implements CanActivate {
  private readonly logger: Logger = new Logger(SlashCommandTokenGuard.name);
  private openAccessWarned: boolean = false;

  public constructor(
    @Inject(AppConfigService) private readonly appConfigService: AppConfigService,
    @Inject(BotIdentityService) private readonly botIdentityService: BotIdentityService,
  ) {}

  public canActivate(context: ExecutionContext): boolean {
    if (!this.botIdentityService.hasAcceptedTokens()) {
      // The bot acts on real channels once connected, so unsigned calls are refused.
      if (this.appConfigService.mattermostEnabled) {
        throw new UnauthorizedException('Slash command token is not configured');
      }

      if (!this.openAccessWarned) {
        this.openAccessWarned = true;
        this.logger.warn(
          'Mattermost is disabled and no slash command token is configured, accepting unsigned requests.',
        );
      }

      return true;
    }

    const request: Request = context.switchToHttp().getRequest<Request>();
    const token: string | null = this.extractToken(request);

    if (token === null || !this.botIdentityService.isAcceptedToken(token)) {
      throw new UnauthorizedException('Invalid slash command token');
    }

    return true;
  }

  private extractToken(request: Request): string | null {
    const body: unknown = request.body;

    if (typeof body === 'object' && body !== null && 'token' in body) {
      const token: unknown = body.token;

      if (typeof token === 'string' && token.length > 0) {
        return token;
      }
    }

    const authHeader: string | undefined = request.headers.authorization;
    const TOKEN_PREFIX = 'Token ';

    if (typeof authHeader === 'string' && authHeader.startsWith(TOKEN_PREFIX)) {
      return authHeader.slice(TOKEN_PREFIX.length);
    }

    return null;
  }
}
