import { z } from 'zod';

// ── Task entry ──────────────────────────────────────────────

export const taskEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  task: z.string().min(1),
  maxSteps: z.number().int().nonnegative().optional(),
});

export type TaskEntry = z.infer<typeof taskEntrySchema>;

// ── Auth block ──────────────────────────────────────────────

export const authConfigSchema = z.object({
  cookie: z.string().optional(),
});

export type AuthConfig = z.infer<typeof authConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  maxSteps: z.number().int().nonnegative().optional().default(15),
  headless: z.boolean().optional().default(false),
  timeout: z.number().positive().optional().default(600),
  outputDir: z.string().min(1).optional().default('.artifacts'),
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  auth: authConfigSchema.optional(),
  tasks: z.array(taskEntrySchema).min(1),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
