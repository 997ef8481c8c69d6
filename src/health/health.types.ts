export type ComponentHealth = {
  readonly ok: boolean;
  readonly details: string;
};

export type AppHealthStatus = {
  readonly status: 'ok' | 'degraded';
  readonly version: string;
  readonly mattermost: ComponentHealth;
  readonly bot: ComponentHealth;
};
