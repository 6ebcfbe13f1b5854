/**
 * Environment variable access shared by the server and client configuration.
 */

export type Env = Record<string, string | undefined>;

export function getEnvVar(env: Env, name: string, defaultValue?: string): string {
  const value = env[name];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}
