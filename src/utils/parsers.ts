import { AndroidDevice } from '../types';

const PACKAGE_PREFIX = 'package:';
const FOCUS_MARKER = 'mCurrentFocus=';
const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const BADGING_LABEL_PATTERN = /^application-label:'(.*)'$/;

function nonEmptyLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

// Parse device list from `adb devices` output
export function parseDeviceList(output: string): AndroidDevice[] {
  const lines = output.trim().split('\n');
  const devices: AndroidDevice[] = [];

  // Skip header line
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    devices.push({ id: parts[0], status: toDeviceStatus(parts[1]) });
  }

  return devices;
}

function toDeviceStatus(value: string): AndroidDevice['status'] {
  switch (value) {
    case 'device':
    case 'offline':
    case 'unauthorized':
      return value;
    default:
      return 'unknown';
  }
}

/**
 * Extracts the identifier from one `pm list packages` line.
 * Returns null when the line has no `:` separator.
 */
export function parsePackageLine(line: string): string | null {
  const separator = line.indexOf(':');
  if (separator === -1) {
    return null;
  }
  const packageName = line.slice(separator + 1).trim();
  return packageName || null;
}

export function parsePackageList(output: string): { packages: string[]; malformed: string[] } {
  const packages: string[] = [];
  const malformed: string[] = [];
  for (const line of nonEmptyLines(output)) {
    const packageName = parsePackageLine(line);
    if (packageName) {
      packages.push(packageName);
    } else {
      malformed.push(line);
    }
  }
  return { packages, malformed };
}

// First APK path printed by `pm path`, split APKs list base.apk first
export function parsePathLine(output: string): string | null {
  const [first] = nonEmptyLines(output);
  if (!first) {
    return null;
  }
  const apkPath = first.startsWith(PACKAGE_PREFIX) ? first.slice(PACKAGE_PREFIX.length) : first;
  return apkPath.trim() || null;
}

/**
 * Picks the APK path for `packageName` out of `pm list packages -f` output,
 * whose lines read `package:/data/app/.../base.apk=com.example.app`.
 * The filter argument of `pm list` matches substrings, so other packages may be listed too.
 */
export function parseApkPathListing(output: string, packageName: string): string | null {
  for (const line of nonEmptyLines(output)) {
    if (!line.startsWith(PACKAGE_PREFIX)) continue;
    const separator = line.lastIndexOf('=');
    if (separator === -1) continue;
    if (line.slice(separator + 1).trim() === packageName) {
      return line.slice(PACKAGE_PREFIX.length, separator) || null;
    }
  }
  return null;
}

export function parseMajorVersion(value: string): number {
  const [major] = value.trim().split('.');
  return /^\d+$/.test(major) ? Number(major) : 0;
}

/**
 * Reads the focused package out of `dumpsys window` output, e.g.
 * `mCurrentFocus=Window{a1b2 u0 com.example.app/com.example.MainActivity}`.
 */
export function parseFocusedPackage(output: string): string | null {
  const focusLines = nonEmptyLines(output).filter(line => line.includes(FOCUS_MARKER));
  for (const line of focusLines) {
    for (const token of line.split(/\s+/)) {
      if (!token.includes('/')) continue;
      const packageName = token.split('/')[0];
      if (packageName) {
        return packageName;
      }
    }
  }
  return null;
}

export function parseKeyValueLines<K extends string>(
  output: string,
  keys: readonly K[]
): Partial<Record<K, string>> {
  const values: Partial<Record<K, string>> = {};
  for (const line of nonEmptyLines(output)) {
    for (const key of keys) {
      if (values[key] === undefined && line.startsWith(`${key}=`)) {
        values[key] = line.slice(key.length + 1).trim();
      }
    }
  }
  return values;
}

/**
 * Accepts `YYYY-MM-DD HH:MM:SS` (local time) or milliseconds since the epoch.
 */
export function parseTimestamp(value: string | undefined): Date | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();

  const match = trimmed.match(DATE_TIME_PATTERN);
  if (match) {
    const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
    // Checked against the calendar only; a time inside a DST gap shifts forward
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    const inRange =
      month >= 1 &&
      month <= 12 &&
      day >= 1 &&
      day <= daysInMonth &&
      hours < 24 &&
      minutes < 60 &&
      seconds < 60;
    if (inRange) {
      return new Date(year, month - 1, day, hours, minutes, seconds);
    }
  }

  if (/^\d+$/.test(trimmed)) {
    const date = new Date(Number(trimmed));
    return Number.isNaN(date.getTime()) ? null : date;
  }

  return null;
}

export function parseBadgingLabel(output: string): string | null {
  for (const line of nonEmptyLines(output)) {
    const match = line.match(BADGING_LABEL_PATTERN);
    if (match && match[1]) {
      return match[1];
    }
  }
  return null;
}

export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
