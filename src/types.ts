import { z } from 'zod';

// Device information interfaces
export interface AndroidDevice {
  id: string;
  status: 'device' | 'offline' | 'unauthorized' | 'unknown';
}

export interface PackageDetails {
  packageName: string;
  label: string;
  versionName: string;
  firstInstallTime: Date | null;
  lastUpdateTime: Date | null;
}

export type InstalledApp = PackageDetails & { firstInstallTime: Date };

export interface Catalogue {
  path: string;
  categories: Map<string, string[]>;
  // Top-level keys other than `catalogue`, written back untouched.
  extras: Record<string, unknown>;
  // Top-level key order of the loaded file, `catalogue` included.
  keyOrder: string[];
}

export interface CatalogueMatch {
  category: string;
  packageName: string;
}

// Catalogue file schema
export const CatalogueDocumentSchema = z
  .object({
    catalogue: z
      .record(z.string(), z.array(z.string()).nullable())
      .nullish()
      .describe('Mapping from category name to the package identifiers it lists'),
  })
  .passthrough();

export type CatalogueDocument = z.infer<typeof CatalogueDocumentSchema>;

// Error handling interfaces
export type ErrorDetails = Record<string, unknown> | null;

export interface ADBError {
  code: string;
  message: string;
  details?: ErrorDetails;
  suggestion?: string;
}

export class ADBCommandError extends Error implements ADBError {
  code: string;
  details?: ErrorDetails;
  suggestion?: string;

  constructor(code: string, message: string, details?: ErrorDetails, suggestion?: string) {
    super(message);
    this.name = 'ADBCommandError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class ADBNotFoundError extends ADBCommandError {
  constructor() {
    super(
      'ADB_NOT_FOUND',
      'Android Debug Bridge (ADB) not found',
      null,
      'Please install Android SDK Platform Tools and ensure ADB is in your PATH'
    );
    this.name = 'ADBNotFoundError';
  }
}

export class NoDevicesFoundError extends ADBCommandError {
  constructor() {
    super(
      'NO_DEVICES_FOUND',
      'No Android devices found after connection',
      null,
      'Please connect an Android device or start an emulator and ensure USB debugging is enabled'
    );
    this.name = 'NoDevicesFoundError';
  }
}

export class DeviceWaitError extends ADBCommandError {
  constructor(originalError?: string) {
    super(
      'DEVICE_WAIT_FAILED',
      'Error connecting to device',
      { originalError },
      'Check the USB cable and accept the debugging prompt on the device'
    );
    this.name = 'DeviceWaitError';
  }
}

export class CatalogueLoadError extends ADBCommandError {
  constructor(filePath: string, reason: string) {
    super(
      'CATALOGUE_LOAD_FAILED',
      `Error loading catalogue from '${filePath}': ${reason}`,
      { filePath, reason },
      'Make sure the file exists and has a top-level "catalogue" mapping of category to package lists'
    );
    this.name = 'CatalogueLoadError';
  }
}

export class CatalogueSaveError extends ADBCommandError {
  constructor(filePath: string, reason: string) {
    super('CATALOGUE_SAVE_FAILED', `Error updating catalogue '${filePath}': ${reason}`, {
      filePath,
      reason,
    });
    this.name = 'CatalogueSaveError';
  }
}

export class APKBackupError extends ADBCommandError {
  constructor(packageName: string, reason: string) {
    super(
      'APK_BACKUP_FAILED',
      `Failed to back up APK for '${packageName}': ${reason}`,
      { packageName, reason },
      'Check free disk space and that the package still exists on the device'
    );
    this.name = 'APKBackupError';
  }
}
