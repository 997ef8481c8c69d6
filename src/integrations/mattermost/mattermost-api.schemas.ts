import { z } from 'zod';

export const mattermostUserSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
  first_name: z.string().default(''),
  last_name: z.string().default(''),
  is_bot: z.boolean().default(false),
  timezone: z
    .object({
      useAutomaticTimezone: z.union([z.string(), z.boolean()]).optional(),
      automaticTimezone: z.string().optional(),
      manualTimezone: z.string().optional(),
    })
    .default({}),
});

export const mattermostUserListSchema = z.array(mattermostUserSchema);

export const mattermostCommandSchema = z.object({
  id: z.string().min(1),
  team_id: z.string(),
  trigger: z.string(),
  token: z.string(),
  delete_at: z.number().default(0),
});

export const mattermostCommandListSchema = z.array(mattermostCommandSchema);

export const mattermostPingSchema = z.object({
  status: z.string(),
});

export const mattermostErrorSchema = z.object({
  message: z.string(),
});
