// pattern: Functional Core
import { z } from "zod";

const DispatchConfigSchema = z.object({
  timeout_ms: z.number().int().positive().optional(),
  confirm_sensitive: z.boolean().default(true),
});

const SearchConfigSchema = z.object({
  api_key: z.string().optional(),
  max_results: z.number().int().positive().max(20).default(5),
});

const TelegramConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    bot_token: z.string().optional(),
    api_base_url: z.string().url().default("https://api.telegram.org"),
  })
  .superRefine((data, ctx) => {
    if (data.enabled && !data.bot_token) {
      ctx.addIssue({ code: "custom", message: "bot_token is required when telegram is enabled", path: ["bot_token"] });
    }
  });

const AgentConfigSchema = z.object({
  default_name: z.string().min(1).default("default"),
  wake_word: z.string().default(""),
});

const AppConfigSchema = z.object({
  dispatch: DispatchConfigSchema.prefault({}),
  search: SearchConfigSchema.prefault({}),
  telegram: TelegramConfigSchema.prefault({}),
  agent: AgentConfigSchema.prefault({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export { AppConfigSchema, DispatchConfigSchema, SearchConfigSchema, TelegramConfigSchema, AgentConfigSchema };
