export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
}

export interface ServiceConfig {
  runtime: RuntimeConfig;
}

let cachedConfig: ServiceConfig | null = null;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function resolveLogLevel(value: string | undefined): string {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return 'info';
  }

  return LOG_LEVELS.some((level) => level === normalized) ? normalized : 'info';
}

function resolveServiceName(value: string | undefined): string {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : 'skillrank';
}

export function loadConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = {
    runtime: {
      serviceName: resolveServiceName(process.env.SERVICE_NAME),
      logLevel: resolveLogLevel(process.env.LOG_LEVEL)
    }
  };

  return cachedConfig;
}

export function getConfig(): ServiceConfig {
  return cachedConfig ?? loadConfig();
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return Array.from(new Set(entries));
}
