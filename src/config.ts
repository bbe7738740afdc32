import path from 'path';

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const ADB_PATH = process.env.ADB_PATH?.trim() || 'adb';
// 0 disables the timeout: wait-for-device may block until a device shows up.
export const ADB_TIMEOUT_MS = readNumber(process.env.ADB_TIMEOUT_MS, 0);
export const ADB_MAX_BUFFER = 50 * 1024 * 1024;

export const CATALOGUE_PATH = path.resolve(
  process.cwd(),
  process.env.APK_HUNTER_CATALOGUE ?? 'catalogue.yaml'
);
export const BACKUP_DIR = process.env.APK_HUNTER_BACKUP_DIR ?? 'apk_backups';
export const DEBUG = process.env.APK_HUNTER_DEBUG === '1';

export const DEFAULT_CATEGORY = 'hunter';
export const PAGE_SIZE = 10;
export const HUNTER_POLL_INTERVAL_MS = 1000;
export const SYSTEM_PACKAGE_PREFIXES = ['com.android.', 'com.google.android.', 'android.'];

export function logDebug(message: string): void {
  if (!DEBUG) return;
  console.error(`[apk-hunter] ${message}`);
}
