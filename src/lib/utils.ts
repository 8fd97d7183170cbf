import * as crypto from 'crypto';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import type { CellValue, SettingValue, SettingsMap } from './types';

dayjs.extend(utc);

export const isEmpty = (v: CellValue | undefined) => v === undefined || v === null || v.trim() === '';
export const toStr = (v: CellValue | undefined) => (v === undefined || v === null ? '' : v);

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function generateId(): string {
  return crypto.randomBytes(4).toString('hex');
}

export function nowIso(): string {
  return dayjs.utc().format('YYYY-MM-DDTHH:mm:ss[Z]');
}

/** Own-key lookup, so labels such as `constructor` never resolve to Object.prototype members. */
export function ownValue<T>(map: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
}

export function isSettingsMap(v: SettingValue | undefined): v is SettingsMap {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// --------------------------
// Typed reads over free-form settings
// --------------------------
export function readBoolean(settings: SettingsMap, key: string, fallback: boolean): boolean {
  const v = settings[key];
  return typeof v === 'boolean' ? v : fallback;
}

export function readString(settings: SettingsMap, key: string): string | undefined {
  const v = settings[key];
  return typeof v === 'string' ? v : undefined;
}

export function readNumber(settings: SettingsMap, key: string): number | undefined {
  const v = settings[key];
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '' && Number.isFinite(Number(v))) return Number(v);
  return undefined;
}

export function readStringList(settings: SettingsMap, key: string): string[] | undefined {
  const v = settings[key];
  if (!Array.isArray(v)) return undefined;
  return v.filter((x): x is string => typeof x === 'string');
}
