/** Environment variables that override the config file. */
export const GAMEWIRE_ENV = {
  HOST: "GAMEWIRE_HOST",
  PORT: "GAMEWIRE_PORT",
  PIPE: "GAMEWIRE_PIPE",
  LOG_LEVEL: "GAMEWIRE_LOG_LEVEL",
} as const;

export function getEnv(
  key: keyof typeof GAMEWIRE_ENV,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[GAMEWIRE_ENV[key]];
  return value === "" ? undefined : value;
}
