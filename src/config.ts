import * as cron from 'node-cron';
import { DEFAULT_HORIZON_DAYS } from './address-book';
import { ConfigError } from './errors';
import { AppConfig } from './types';

export const DEFAULT_REMINDER_CRON = '0 9 * * *';

type Env = Record<string, string | undefined>;

function readInt(env: Env, variable: string, fallback: number): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(variable, `expected a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function readBool(env: Env, variable: string, fallback: boolean): boolean {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(variable, `expected true or false, got "${raw}"`);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const reminderCron = env.REMINDER_CRON || DEFAULT_REMINDER_CRON;
  if (!cron.validate(reminderCron)) {
    throw new ConfigError('REMINDER_CRON', `"${reminderCron}" is not a cron expression`);
  }

  return {
    port: readInt(env, 'PORT', 3000),
    horizonDays: readInt(env, 'BIRTHDAY_HORIZON_DAYS', DEFAULT_HORIZON_DAYS),
    reminderCron,
    reminderEnabled: readBool(env, 'REMINDER_ENABLED', true),
  };
}
