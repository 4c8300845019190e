import { z } from 'zod';

// ── Credentials ─────────────────────────────────────────────

export const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export type Credentials = z.infer<typeof credentialsSchema>;

/**
 * Read login credentials from the environment.
 * Both variables must be set; otherwise the run has no credentials.
 */
export function loadCredentials(
  env: NodeJS.ProcessEnv = process.env,
): Credentials | undefined {
  const result = credentialsSchema.safeParse({
    username: env['PAGEPILOT_USERNAME'],
    password: env['PAGEPILOT_PASSWORD'],
  });
  return result.success ? result.data : undefined;
}
