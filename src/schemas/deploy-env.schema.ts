import { z } from 'zod';

// CI environment read by the patcher. Secrets are optional here so the
// skip gate can be evaluated before they are required.
export const DeployEnvSchema = z.object({
  TRAVIS_SECURE_ENV_VARS: z.string(),
  SONATYPE_USERNAME: z.string().optional(),
  SONATYPE_PASSWORD: z.string().optional(),
});

export type DeployEnv = z.infer<typeof DeployEnvSchema>;

export function parseDeployEnv(env: NodeJS.ProcessEnv): DeployEnv {
  const result = DeployEnvSchema.safeParse(env);
  if (!result.success) {
    const name = result.error.issues[0]?.path.join('.') ?? 'unknown';
    throw new Error(`Missing environment variable: ${name}`);
  }
  return result.data;
}

/**
 * Only the literal "false" means secrets are withheld (e.g. pull request builds).
 */
export function isSecureEnvAvailable(env: DeployEnv): boolean {
  return env.TRAVIS_SECURE_ENV_VARS !== 'false';
}
