import { z } from 'zod';

export const slashCommandSchema = z.object({
  token: z.string().default(''),
  team_id: z.string().default(''),
  channel_id: z.string().min(1),
  user_id: z.string().min(1),
  command: z.string().min(1),
  text: z.string().default(''),
});

export type SlashCommandDto = z.infer<typeof slashCommandSchema>;
