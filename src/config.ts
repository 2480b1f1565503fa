import { addDays, format, isValid, parse, startOfDay, subDays } from 'date-fns';
import type { HarvestConfig } from './types/harvest.js';
import type { TimeRange, TimingConfig } from './types/timing.js';
import type { SyncOptions } from './types/sync.js';
import { HARVEST_API_BASE } from './services/harvest.js';
import { TIMING_API_BASE } from './services/timing.js';
import { calendarDate, isValidTimeZone, startOfDayInZone } from './utils/time.js';
import { DEFAULT_LOOKBACK_HOURS } from './services/sync.js';

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_WINDOW_DAYS = 7;

type Env = Record<string, string | undefined>;

export type HarvestOverrides = {
  personalAccessToken?: string;
  accountId?: string;
};

export type TimingOverrides = {
  personalAccessToken?: string;
};

export type SyncOverrides = {
  timeZone?: string;
  roundTo?: string;
  lookbackHours?: string;
  dryRun?: boolean;
};

function requireValues(values: Record<string, string>): void {
  const missing = Object.entries(values)
    .filter(([, value]) => !value)
    .map(([name]) => name);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}\n` +
      'Set them in your environment or .env file, or pass the matching command-line options.'
    );
  }
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer of at least ${min}, got "${raw}"`);
  }
  return value;
}

function timeoutMs(env: Env): number {
  return parseInteger('HTTP_TIMEOUT_MS', env.HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, 1);
}

export function loadHarvestConfig(overrides: HarvestOverrides = {}, env: Env = process.env): HarvestConfig {
  const config: HarvestConfig = {
    accessToken: overrides.personalAccessToken || env.HARVEST_PERSONAL_ACCESS_TOKEN || '',
    accountId: overrides.accountId || env.HARVEST_ACCOUNT_ID || '',
    baseUrl: HARVEST_API_BASE,
    timeoutMs: timeoutMs(env),
  };

  requireValues({
    HARVEST_PERSONAL_ACCESS_TOKEN: config.accessToken,
    HARVEST_ACCOUNT_ID: config.accountId,
  });

  return config;
}

export function loadTimingConfig(overrides: TimingOverrides = {}, env: Env = process.env): TimingConfig {
  const config: TimingConfig = {
    accessToken: overrides.personalAccessToken || env.TIMING_PERSONAL_ACCESS_TOKEN || '',
    baseUrl: TIMING_API_BASE,
    timeoutMs: timeoutMs(env),
  };

  requireValues({ TIMING_PERSONAL_ACCESS_TOKEN: config.accessToken });

  return config;
}

export function loadSyncOptions(overrides: SyncOverrides = {}, env: Env = process.env): SyncOptions {
  const timeZone = overrides.timeZone || env.SYNC_TIME_ZONE || undefined;
  if (timeZone && !isValidTimeZone(timeZone)) {
    throw new Error(`Unknown time zone "${timeZone}"`);
  }

  return {
    timeZone,
    roundingMinutes: parseInteger(
      'SYNC_ROUNDING_MINUTES',
      overrides.roundTo ?? env.SYNC_ROUNDING_MINUTES,
      0,
      0
    ),
    lookbackHours: parseInteger(
      'SYNC_LOOKBACK_HOURS',
      overrides.lookbackHours ?? env.SYNC_LOOKBACK_HOURS,
      DEFAULT_LOOKBACK_HOURS,
      1
    ),
    dryRun: overrides.dryRun ?? false,
  };
}

function parseDay(label: string, value: string, now: Date): Date {
  const day = parse(value, 'yyyy-MM-dd', now);
  if (!isValid(day)) {
    throw new Error(`${label} must be a date in YYYY-MM-DD format, got "${value}"`);
  }
  return startOfDay(day);
}

/**
 * Turns inclusive `--from`/`--to` days into the half-open window
 * `[from 00:00, to + 1 day 00:00)`, in `timeZone` when given and local time
 * otherwise. Defaults to the last seven days up to and including today.
 */
export function parseWindow(
  from: string | undefined,
  to: string | undefined,
  now: Date = new Date(),
  timeZone?: string
): TimeRange {
  const today = parseDay('today', calendarDate(now, timeZone), now);
  const first = from ? parseDay('--from', from, now) : subDays(today, DEFAULT_WINDOW_DAYS);
  const last = to ? parseDay('--to', to, now) : today;

  if (last < first) {
    throw new Error(`--to (${format(last, 'yyyy-MM-dd')}) is before --from (${format(first, 'yyyy-MM-dd')})`);
  }

  const next = addDays(last, 1);
  if (!timeZone) {
    return { start: first, end: next };
  }
  return { start: startOfDayInZone(first, timeZone), end: startOfDayInZone(next, timeZone) };
}
