import { execSync, ExecSyncOptions } from 'child_process';
import fs from 'fs';
import path from 'path';
import { ADB_MAX_BUFFER, ADB_PATH, ADB_TIMEOUT_MS, logDebug } from '../config';
import {
  ADBCommandError,
  APKBackupError,
  DeviceWaitError,
  NoDevicesFoundError,
} from '../types';
import {
  formatBackupTimestamp,
  parseDeviceList,
  parseFocusedPackage,
  parseMajorVersion,
  parsePackageList,
  parsePathLine,
} from './parsers';
import { errorMessage } from './error';

const VERSION_CHECK_TIMEOUT = 5000;
// Android 10 moved the focused window under `dumpsys window displays`.
const DISPLAYS_FOCUS_MIN_VERSION = 10;

export function escapeShellArg(value: string): string {
  if (process.platform === 'win32') {
    const escaped = value.replace(/"/g, '\\"');
    return /[\s"]/g.test(value) ? `"${escaped}"` : escaped;
  }

  return `'${value.replace(/'/g, `'\\''`)}'`;
}

const ADB_BINARY = /\s/.test(ADB_PATH) ? escapeShellArg(ADB_PATH) : ADB_PATH;

function toText(value: unknown): string {
  if (Buffer.isBuffer(value)) {
    return value.toString('utf-8');
  }
  return typeof value === 'string' ? value : '';
}

function describeExecError(error: unknown): { message: string; status?: number; stderr: string } {
  if (!(error instanceof Error)) {
    return { message: String(error), stderr: '' };
  }
  const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  const stderr = 'stderr' in error ? toText(error.stderr).trim() : '';
  return { message: error.message, status, stderr };
}

// Check if ADB is available
export function checkADBInstalled(): boolean {
  try {
    execSync(`${ADB_BINARY} version`, { stdio: 'pipe', timeout: VERSION_CHECK_TIMEOUT });
    return true;
  } catch (error) {
    return false;
  }
}

// Execute ADB command with error handling
export function executeADBCommand(command: string, options: ExecSyncOptions = {}): string {
  const execOptions: ExecSyncOptions = {
    stdio: 'pipe',
    timeout: ADB_TIMEOUT_MS,
    maxBuffer: ADB_MAX_BUFFER,
    ...options,
  };

  logDebug(`adb ${command}`);
  try {
    return toText(execSync(`${ADB_BINARY} ${command}`, execOptions));
  } catch (error) {
    const { message, status, stderr } = describeExecError(error);
    throw new ADBCommandError('ADB_COMMAND_FAILED', `ADB command failed: ${message}`, {
      command,
      status,
      stderr,
    });
  }
}

/**
 * Blocks until adb reports a device, then returns the serial of the first one listed.
 */
export function waitForDevice(): string {
  let output: string;
  try {
    executeADBCommand('wait-for-device', { timeout: 0 });
    output = executeADBCommand('devices');
  } catch (error) {
    throw new DeviceWaitError(errorMessage(error));
  }

  const devices = parseDeviceList(output);
  if (devices.length === 0) {
    throw new NoDevicesFoundError();
  }

  return devices[0].id;
}

export function listInstalledPackages(deviceId: string): string[] {
  let output: string;
  try {
    output = executeADBCommand(`-s ${deviceId} shell pm list packages`);
  } catch (error) {
    throw new ADBCommandError('FAILED_TO_LIST_PACKAGES', 'Error getting installed packages', {
      deviceId,
      originalError: errorMessage(error),
    });
  }

  const { packages, malformed } = parsePackageList(output);
  for (const line of malformed) {
    logDebug(`skipping unparseable package line: ${line}`);
  }
  return packages;
}

export function uninstallPackage(deviceId: string, packageName: string): boolean {
  try {
    const output = executeADBCommand(
      `-s ${deviceId} shell pm uninstall ${escapeShellArg(packageName)}`
    );
    // Older releases of pm exit 0 and print the failure instead.
    const failure = output.split('\n').find(line => line.trim().startsWith('Failure'));
    if (failure) {
      logDebug(`uninstall of ${packageName} failed: ${failure.trim()}`);
      return false;
    }
    return true;
  } catch (error) {
    logDebug(`uninstall of ${packageName} failed: ${errorMessage(error)}`);
    return false;
  }
}

export function getAndroidMajorVersion(deviceId: string): number {
  try {
    return parseMajorVersion(
      executeADBCommand(`-s ${deviceId} shell getprop ro.build.version.release`)
    );
  } catch {
    return 0;
  }
}

export function getCurrentForegroundPackage(
  deviceId: string,
  androidVersion: number = getAndroidMajorVersion(deviceId)
): string | null {
  const command =
    androidVersion >= DISPLAYS_FOCUS_MIN_VERSION
      ? 'shell dumpsys window displays'
      : 'shell dumpsys window';
  try {
    return parseFocusedPackage(executeADBCommand(`-s ${deviceId} ${command}`));
  } catch (error) {
    logDebug(`focus query failed: ${errorMessage(error)}`);
    return null;
  }
}

export function getApkPath(deviceId: string, packageName: string): string | null {
  try {
    return parsePathLine(
      executeADBCommand(`-s ${deviceId} shell pm path ${escapeShellArg(packageName)}`)
    );
  } catch (error) {
    logDebug(`pm path ${packageName} failed: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Copies the package's base APK to `<outputDir>/<packageName>_<YYYYMMDD_HHMMSS>.apk`.
 * @returns the local path of the copy
 */
export function pullApk(
  deviceId: string,
  packageName: string,
  outputDir: string,
  now: Date = new Date()
): string {
  const remotePath = getApkPath(deviceId, packageName);
  if (!remotePath) {
    throw new APKBackupError(packageName, 'APK path not found on device');
  }

  const localPath = path.join(outputDir, `${packageName}_${formatBackupTimestamp(now)}.apk`);
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    executeADBCommand(
      `-s ${deviceId} pull ${escapeShellArg(remotePath)} ${escapeShellArg(localPath)}`
    );
  } catch (error) {
    throw new APKBackupError(packageName, errorMessage(error));
  }

  if (!fs.existsSync(localPath)) {
    throw new APKBackupError(packageName, `pulled file missing at ${localPath}`);
  }

  return localPath;
}
