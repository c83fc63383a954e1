export type StartupConfig = {
  port: number;
  host: string;
  autoTick: boolean;
};

const parsePositivePort = (value: string | undefined): number | null => {
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || Number.isNaN(parsed) || parsed <= 0) return null;
  return parsed;
};

const parseBooleanFlag = (value: string | undefined, defaultValue: boolean): boolean => {
  if (!value?.trim()) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  return defaultValue;
};

export const resolveStartupConfig = (env: NodeJS.ProcessEnv): StartupConfig => {
  const port = parsePositivePort(env.PORT) ?? 5000;
  const host = env.HOST?.trim() ? env.HOST.trim() : "127.0.0.1";
  return {
    port,
    host,
    // RIG_AUTO_TICK=0 leaves ticking to an external driver
    autoTick: parseBooleanFlag(env.RIG_AUTO_TICK, true),
  };
};
