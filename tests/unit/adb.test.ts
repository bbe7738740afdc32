import { execSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import {
  checkADBInstalled,
  executeADBCommand,
  getAndroidMajorVersion,
  getApkPath,
  getCurrentForegroundPackage,
  listInstalledPackages,
  pullApk,
  uninstallPackage,
  waitForDevice,
} from '../../src/utils/adb';
import {
  ADBCommandError,
  APKBackupError,
  DeviceWaitError,
  NoDevicesFoundError,
} from '../../src/types';
import {
  DEVICE_ID,
  execFailure,
  mockADBVersionOutput,
  mockAdbResponses,
  mockDeviceListOutput,
  mockEmptyDeviceListOutput,
} from '../mocks/adb.mock';
import { makeTempDir } from '../mocks/catalogue.mock';

// Mock execSync
jest.mock('child_process', () => ({
  execSync: jest.fn(),
}));

const FOCUS_OUTPUT = `WINDOW MANAGER DISPLAY CONTENTS (dumpsys window displays)
  Display: mDisplayId=0
    mCurrentFocus=Window{a1b2 u0 com.example.app/com.example.MainActivity}
    mFocusedApp=ActivityRecord{c3d4 u0 com.example.app/.MainActivity t12}`;

describe('ADB Utilities', () => {
  const mockExecSync = jest.mocked(execSync);
  const ADB_EXEC_OPTIONS = { stdio: 'pipe', timeout: 0, maxBuffer: 50 * 1024 * 1024 };

  beforeEach(() => {
    jest.resetAllMocks();
  });

  describe('checkADBInstalled', () => {
    it('should return true if ADB is installed', () => {
      mockExecSync.mockReturnValue(Buffer.from(mockADBVersionOutput));

      expect(checkADBInstalled()).toBe(true);
      expect(mockExecSync).toHaveBeenCalledWith('adb version', { stdio: 'pipe', timeout: 5000 });
    });

    it('should return false if ADB is not installed', () => {
      mockExecSync.mockImplementation(() => {
        throw new Error('Command not found');
      });

      expect(checkADBInstalled()).toBe(false);
    });
  });

  describe('executeADBCommand', () => {
    it('should execute ADB command successfully', () => {
      mockExecSync.mockReturnValue(Buffer.from('List of devices attached'));

      const result = executeADBCommand('devices');

      expect(result).toBe('List of devices attached');
      expect(mockExecSync).toHaveBeenCalledWith('adb devices', ADB_EXEC_OPTIONS);
    });

    it('should throw ADBCommandError carrying exit status and stderr', () => {
      mockExecSync.mockImplementation(() => {
        throw execFailure('Command failed', 1, 'error: device offline\n');
      });

      let caught: unknown;
      try {
        executeADBCommand('devices');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ADBCommandError);
      if (caught instanceof ADBCommandError) {
        expect(caught.code).toBe('ADB_COMMAND_FAILED');
        expect(caught.message).toBe('ADB command failed: Command failed');
        expect(caught.details).toEqual({
          command: 'devices',
          status: 1,
          stderr: 'error: device offline',
        });
      }
    });
  });

  describe('waitForDevice', () => {
    it('should wait without a timeout and return the first listed serial', () => {
      mockAdbResponses({ 'wait-for-device': '', devices: mockDeviceListOutput });

      expect(waitForDevice()).toBe('emulator-5554');
      expect(mockExecSync).toHaveBeenNthCalledWith(1, 'adb wait-for-device', ADB_EXEC_OPTIONS);
      expect(mockExecSync).toHaveBeenNthCalledWith(2, 'adb devices', ADB_EXEC_OPTIONS);
    });

    it('should throw NoDevicesFoundError if no devices are listed', () => {
      mockAdbResponses({ 'wait-for-device': '', devices: mockEmptyDeviceListOutput });

      expect(() => waitForDevice()).toThrow(NoDevicesFoundError);
    });

    it('should throw DeviceWaitError if the wait call fails', () => {
      mockAdbResponses({ 'wait-for-device': execFailure('adb server died') });

      expect(() => waitForDevice()).toThrow(DeviceWaitError);
    });
  });

  describe('listInstalledPackages', () => {
    it('should split each package line on the colon', () => {
      mockAdbResponses({
        [`-s ${DEVICE_ID} shell pm list packages`]:
          'package:com.example.app\npackage:com.other.app\n\nmalformed-line\n',
      });

      expect(listInstalledPackages(DEVICE_ID)).toEqual(['com.example.app', 'com.other.app']);
    });

    it('should throw FAILED_TO_LIST_PACKAGES when the call fails', () => {
      mockAdbResponses({});

      expect(() => listInstalledPackages(DEVICE_ID)).toThrow('Error getting installed packages');
    });
  });

  describe('uninstallPackage', () => {
    const command = `-s ${DEVICE_ID} shell pm uninstall 'com.example.app'`;

    it('should return true on success', () => {
      mockAdbResponses({ [command]: 'Success\n' });

      expect(uninstallPackage(DEVICE_ID, 'com.example.app')).toBe(true);
      expect(mockExecSync).toHaveBeenCalledWith(`adb ${command}`, ADB_EXEC_OPTIONS);
    });

    it('should return false on a non-zero exit', () => {
      mockAdbResponses({ [command]: execFailure('Command failed', 1) });

      expect(uninstallPackage(DEVICE_ID, 'com.example.app')).toBe(false);
    });

    it('should return false when pm prints a failure with exit status 0', () => {
      mockAdbResponses({ [command]: 'Failure [DELETE_FAILED_INTERNAL_ERROR]\n' });

      expect(uninstallPackage(DEVICE_ID, 'com.example.app')).toBe(false);
    });
  });

  describe('getAndroidMajorVersion', () => {
    const command = `-s ${DEVICE_ID} shell getprop ro.build.version.release`;

    it('should parse the leading number of the release', () => {
      mockAdbResponses({ [command]: '8.1.0\n' });

      expect(getAndroidMajorVersion(DEVICE_ID)).toBe(8);
    });

    it('should return 0 when the property cannot be read', () => {
      mockAdbResponses({});

      expect(getAndroidMajorVersion(DEVICE_ID)).toBe(0);
    });
  });

  describe('getCurrentForegroundPackage', () => {
    it('should query window displays on Android 10 and later', () => {
      mockAdbResponses({ [`-s ${DEVICE_ID} shell dumpsys window displays`]: FOCUS_OUTPUT });

      expect(getCurrentForegroundPackage(DEVICE_ID, 13)).toBe('com.example.app');
    });

    it('should use the legacy window dump before Android 10', () => {
      mockAdbResponses({ [`-s ${DEVICE_ID} shell dumpsys window`]: FOCUS_OUTPUT });

      expect(getCurrentForegroundPackage(DEVICE_ID, 9)).toBe('com.example.app');
    });

    it('should look up the Android version when none is given', () => {
      mockAdbResponses({
        [`-s ${DEVICE_ID} shell getprop ro.build.version.release`]: '11\n',
        [`-s ${DEVICE_ID} shell dumpsys window displays`]: FOCUS_OUTPUT,
      });

      expect(getCurrentForegroundPackage(DEVICE_ID)).toBe('com.example.app');
      expect(mockExecSync).toHaveBeenCalledTimes(2);
    });

    it('should return null when the query fails', () => {
      mockAdbResponses({});

      expect(getCurrentForegroundPackage(DEVICE_ID, 13)).toBeNull();
    });
  });

  describe('getApkPath', () => {
    it('should strip the package: prefix', () => {
      mockAdbResponses({
        [`-s ${DEVICE_ID} shell pm path 'com.example.app'`]:
          'package:/data/app/com.example.app-1/base.apk\npackage:/data/app/com.example.app-1/split_config.en.apk\n',
      });

      expect(getApkPath(DEVICE_ID, 'com.example.app')).toBe('/data/app/com.example.app-1/base.apk');
    });
  });

  describe('pullApk', () => {
    const remotePath = '/data/app/com.example.app-1/base.apk';
    const pathCommand = `-s ${DEVICE_ID} shell pm path 'com.example.app'`;
    const now = new Date(2024, 0, 15, 10, 30, 45);

    it('should create the output directory and return the pulled file', () => {
      const outputDir = path.join(makeTempDir(), 'apk_backups');
      const expectedPath = path.join(outputDir, 'com.example.app_20240115_103045.apk');
      mockAdbResponses({
        [pathCommand]: `package:${remotePath}\n`,
        [`-s ${DEVICE_ID} pull '${remotePath}' '${expectedPath}'`]: () => {
          fs.writeFileSync(expectedPath, 'apk-bytes');
          return '1 file pulled.\n';
        },
      });

      expect(pullApk(DEVICE_ID, 'com.example.app', outputDir, now)).toBe(expectedPath);
      expect(fs.readFileSync(expectedPath, 'utf8')).toBe('apk-bytes');
    });

    it('should throw APKBackupError when the APK path is unknown', () => {
      mockAdbResponses({ [pathCommand]: '' });

      expect(() => pullApk(DEVICE_ID, 'com.example.app', makeTempDir(), now)).toThrow(
        APKBackupError
      );
    });

    it('should throw APKBackupError when the pulled file is missing', () => {
      const outputDir = makeTempDir();
      const expectedPath = path.join(outputDir, 'com.example.app_20240115_103045.apk');
      mockAdbResponses({
        [pathCommand]: `package:${remotePath}\n`,
        [`-s ${DEVICE_ID} pull '${remotePath}' '${expectedPath}'`]: '',
      });

      expect(() => pullApk(DEVICE_ID, 'com.example.app', outputDir, now)).toThrow(
        `Failed to back up APK for 'com.example.app': pulled file missing at ${expectedPath}`
      );
    });
  });
});
