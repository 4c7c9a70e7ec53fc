import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  CAVEATKIT_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CAVEATKIT_ALLOW_INSECURE_UNRESTRICTED_DELEGATION: booleanString.default(
    'false',
  ),
  CAVEATKIT_START_TIMESTAMP: z.coerce.bigint().nonnegative().optional(),
  CAVEATKIT_START_BLOCK: z.coerce.bigint().nonnegative().optional(),
});

export type FrameworkConfig = {
  logLevel: z.infer<typeof configSchema>['CAVEATKIT_LOG_LEVEL'];
  /**
   * Allows building and signing delegations that carry no caveats.
   */
  allowInsecureUnrestrictedDelegation: boolean;
  /**
   * The initial timestamp of a manual clock, in seconds.
   */
  startTimestamp?: bigint | undefined;
  startBlock?: bigint | undefined;
};

/**
 * Reads the framework configuration from environment variables.
 *
 * @param env - The environment to read, `process.env` by default.
 * @returns The validated configuration.
 * @throws Error listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): FrameworkConfig {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const { data } = result;
  return {
    logLevel: data.CAVEATKIT_LOG_LEVEL,
    allowInsecureUnrestrictedDelegation:
      data.CAVEATKIT_ALLOW_INSECURE_UNRESTRICTED_DELEGATION,
    startTimestamp: data.CAVEATKIT_START_TIMESTAMP,
    startBlock: data.CAVEATKIT_START_BLOCK,
  };
}
