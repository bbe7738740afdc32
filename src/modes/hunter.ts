import { setTimeout as sleep } from 'timers/promises';
import { DEFAULT_CATEGORY, HUNTER_POLL_INTERVAL_MS } from '../config';
import { Catalogue } from '../types';
import {
  getAndroidMajorVersion,
  getCurrentForegroundPackage,
  uninstallPackage,
} from '../utils/adb';
import { recordUninstalledPackage } from '../utils/catalogue';
import { isAbortError } from '../utils/error';
import { confirm } from '../utils/prompt';
import { ModeContext } from './context';

export interface HunterOptions {
  intervalMs?: number;
  category?: string;
}

/**
 * Watches the foreground app and offers to uninstall every newly focused package.
 * Runs until the context signal aborts.
 */
export async function runHunterMode(
  context: ModeContext,
  options: HunterOptions = {}
): Promise<Catalogue> {
  const { deviceId, catalogue, prompter, signal } = context;
  const intervalMs = options.intervalMs ?? HUNTER_POLL_INTERVAL_MS;
  const category = options.category ?? DEFAULT_CATEGORY;

  console.log('Entering hunter mode (Press Ctrl+C to exit)...');
  console.log('Monitoring current app...');

  const androidVersion = getAndroidMajorVersion(deviceId);
  let lastPackage: string | null = null;

  try {
    while (!signal.aborted) {
      const currentPackage = getCurrentForegroundPackage(deviceId, androidVersion);
      if (currentPackage && currentPackage !== lastPackage) {
        lastPackage = currentPackage;
        console.log(`\nCurrent app: ${currentPackage}`);

        if (await confirm(prompter, 'Uninstall this app?')) {
          if (uninstallPackage(deviceId, currentPackage)) {
            console.log('Successfully uninstalled.');
            recordUninstalledPackage(catalogue, currentPackage, category);
          } else {
            console.log('Failed to uninstall.');
          }
        } else {
          console.log('Continuing the watch...');
        }
      }

      await sleep(intervalMs, undefined, { signal });
    }
  } catch (error) {
    if (!isAbortError(error)) {
      throw error;
    }
  }

  console.log('\nExiting hunter mode...');
  return catalogue;
}
