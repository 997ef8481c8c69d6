import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv } from './app-config.schema';
import type { AppConfig, LogLevel, NodeEnv } from './app-config.types';
import { assertMattermostConfig } from './app-config.validators';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    assertMattermostConfig(parsedEnv);

    this.config = Object.freeze(mapAppConfig(parsedEnv));
  }

  public get snapshot(): AppConfig {
    return this.config;
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): NodeEnv {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  public get mattermostEnabled(): boolean {
    return this.config.mattermostEnabled;
  }

  public get mattermostUrl(): string | null {
    return this.config.mattermostUrl;
  }

  public get mattermostBotToken(): string | null {
    return this.config.mattermostBotToken;
  }

  public get mattermostTimeoutMs(): number {
    return this.config.mattermostTimeoutMs;
  }

  public get mattermostCommandToken(): string | null {
    return this.config.mattermostCommandToken;
  }

  public get mattermostTeamId(): string | null {
    return this.config.mattermostTeamId;
  }

  public get commandTrigger(): string {
    return this.config.commandTrigger;
  }

  public get commandRegistrationEnabled(): boolean {
    return this.config.commandRegistrationEnabled;
  }

  public get commandCallbackUrl(): string | null {
    return this.config.commandCallbackUrl;
  }

  public get maxChannelMembers(): number {
    return this.config.maxChannelMembers;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }
}
