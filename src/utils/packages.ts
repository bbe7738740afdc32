import { SYSTEM_PACKAGE_PREFIXES, logDebug } from '../config';
import { InstalledApp, PackageDetails } from '../types';
import { escapeShellArg, executeADBCommand, listInstalledPackages } from './adb';
import { errorMessage } from './error';
import {
  parseApkPathListing,
  parseBadgingLabel,
  parseKeyValueLines,
  parseTimestamp,
} from './parsers';

const DUMP_KEYS = ['versionName', 'firstInstallTime', 'lastUpdateTime'] as const;

function lookupLabel(deviceId: string, packageName: string): string | null {
  try {
    const listing = executeADBCommand(
      `-s ${deviceId} shell pm list packages -f ${escapeShellArg(packageName)}`
    );
    const apkPath = parseApkPathListing(listing, packageName);
    if (!apkPath) {
      return null;
    }
    const badging = executeADBCommand(
      `-s ${deviceId} shell aapt dump badging ${escapeShellArg(apkPath)}`
    );
    return parseBadgingLabel(badging);
  } catch (error) {
    logDebug(`label lookup for ${packageName} failed: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Reads version and install/update times from `dumpsys package`.
 * The label comes from `aapt dump badging` when the device has aapt, else it is the package name.
 * @returns null when the dump itself fails
 */
export function getPackageDetails(deviceId: string, packageName: string): PackageDetails | null {
  let dump: string;
  try {
    dump = executeADBCommand(`-s ${deviceId} shell dumpsys package ${escapeShellArg(packageName)}`);
  } catch (error) {
    logDebug(`dumpsys package ${packageName} failed: ${errorMessage(error)}`);
    return null;
  }

  const values = parseKeyValueLines(dump, DUMP_KEYS);
  return {
    packageName,
    label: lookupLabel(deviceId, packageName) ?? packageName,
    versionName: values.versionName || 'unknown',
    firstInstallTime: parseTimestamp(values.firstInstallTime),
    lastUpdateTime: parseTimestamp(values.lastUpdateTime),
  };
}

export function isSystemPackage(packageName: string): boolean {
  return SYSTEM_PACKAGE_PREFIXES.some(prefix => packageName.startsWith(prefix));
}

function hasInstallTime(details: PackageDetails | null): details is InstalledApp {
  return details !== null && details.firstInstallTime !== null;
}

// User apps, newest install first
export function getAllAppsWithDetails(deviceId: string): InstalledApp[] {
  const packages = listInstalledPackages(deviceId).filter(
    packageName => !isSystemPackage(packageName)
  );

  console.log(`Fetching details for ${packages.length} packages...`);
  return packages
    .map(packageName => getPackageDetails(deviceId, packageName))
    .filter(hasInstallTime)
    .sort((a, b) => b.firstInstallTime.getTime() - a.firstInstallTime.getTime());
}
