export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

type LogFields = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_WEIGHT;
}

let configuredThreshold: LogThreshold | undefined;

/** Takes precedence over LOG_LEVEL; `undefined` goes back to the environment. */
export function setLogLevel(level: LogThreshold | undefined): void {
  configuredThreshold = level;
}

// Lu à chaque appel pour que LOG_LEVEL puisse changer sans recharger le module.
function currentThreshold(): number {
  if (configuredThreshold) {
    return LEVEL_WEIGHT[configuredThreshold];
  }
  const raw = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  return isThreshold(raw) ? LEVEL_WEIGHT[raw] : LEVEL_WEIGHT.info;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

function write(level: LogLevel, event: string, fields?: LogFields): void {
  if (LEVEL_WEIGHT[level] < currentThreshold()) {
    return;
  }

  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    event,
    ...fields
  });

  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
}

export function logDebug(event: string, fields?: LogFields): void {
  write('debug', event, fields);
}

export function logInfo(event: string, fields?: LogFields): void {
  write('info', event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  write('warn', event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  write('error', event, fields);
}
