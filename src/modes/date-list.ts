import { BACKUP_DIR, DEFAULT_CATEGORY, PAGE_SIZE } from '../config';
import { Catalogue, InstalledApp } from '../types';
import { pullApk, uninstallPackage } from '../utils/adb';
import { recordUninstalledPackage } from '../utils/catalogue';
import { formatError, isFatalError } from '../utils/error';
import { getAllAppsWithDetails } from '../utils/packages';
import { formatDateTime } from '../utils/parsers';
import { confirm } from '../utils/prompt';
import { ModeContext } from './context';

export interface PageState {
  page: number;
  totalPages: number;
}

export type IndexResult = { ok: true; index: number } | { ok: false; reason: string };

export interface DateListOptions {
  backupDir?: string;
  category?: string;
}

export function countPages(itemCount: number, pageSize: number = PAGE_SIZE): number {
  return Math.max(1, Math.ceil(itemCount / pageSize));
}

export function clampPage(page: number, totalPages: number): number {
  return Math.min(Math.max(page, 1), totalPages);
}

export function nextPage(state: PageState): PageState {
  return state.page < state.totalPages ? { ...state, page: state.page + 1 } : state;
}

export function prevPage(state: PageState): PageState {
  return state.page > 1 ? { ...state, page: state.page - 1 } : state;
}

export function pageItems<T>(items: T[], page: number, pageSize: number = PAGE_SIZE): T[] {
  const start = (page - 1) * pageSize;
  return items.slice(start, start + pageSize);
}

// Converts the 1-based number shown on screen into a list index
export function parseIndex(input: string, itemCount: number): IndexResult {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { ok: false, reason: 'Please enter a valid number.' };
  }

  const position = Number(trimmed);
  if (position < 1 || position > itemCount) {
    return { ok: false, reason: `Invalid number. Choose between 1 and ${itemCount}.` };
  }

  return { ok: true, index: position - 1 };
}

function formatApp(app: InstalledApp, position: number): string {
  const updated = app.lastUpdateTime ? formatDateTime(app.lastUpdateTime) : 'unknown';
  return (
    `${position}. ${app.label} (${app.packageName}) v${app.versionName}\n` +
    `    installed: ${formatDateTime(app.firstInstallTime)}  updated: ${updated}`
  );
}

function renderPage(apps: InstalledApp[], state: PageState): void {
  console.log(`\nInstalled apps, newest first (page ${state.page}/${state.totalPages}):`);
  if (apps.length === 0) {
    console.log('No apps left.');
    return;
  }

  const offset = (state.page - 1) * PAGE_SIZE;
  pageItems(apps, state.page).forEach((app, i) => console.log(formatApp(app, offset + i + 1)));
}

function printMenu(): void {
  console.log('\nOptions:');
  console.log('  n - next page');
  console.log('  p - previous page');
  console.log('  u - uninstall an app');
  console.log('  b - back up APK, then uninstall');
  console.log('  q - quit');
}

async function uninstallFromList(
  context: ModeContext,
  apps: InstalledApp[],
  state: PageState,
  options: { backup: boolean; backupDir: string; category: string }
): Promise<PageState> {
  const { deviceId, catalogue, prompter } = context;

  if (apps.length === 0) {
    console.log('There is nothing left to uninstall.');
    return state;
  }

  const answer = await prompter.ask(`Enter app number (1-${apps.length}): `);
  const selection = parseIndex(answer, apps.length);
  if (!selection.ok) {
    console.log(selection.reason);
    return state;
  }

  const app = apps[selection.index];
  if (!(await confirm(prompter, `Uninstall ${app.label} (${app.packageName})?`))) {
    console.log('Operation cancelled.');
    return state;
  }

  if (options.backup) {
    try {
      const localPath = pullApk(deviceId, app.packageName, options.backupDir);
      console.log(`APK saved to ${localPath}`);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      console.error(formatError(error));
      console.log('Uninstall aborted.');
      return state;
    }
  }

  if (!uninstallPackage(deviceId, app.packageName)) {
    console.log('Failed to uninstall.');
    return state;
  }

  console.log('Successfully uninstalled.');
  apps.splice(selection.index, 1);
  recordUninstalledPackage(catalogue, app.packageName, options.category);

  const totalPages = countPages(apps.length);
  return { page: clampPage(state.page, totalPages), totalPages };
}

/**
 * Pages through user-installed apps, newest install first, offering uninstall
 * with or without an APK backup.
 */
export async function runDateListMode(
  context: ModeContext,
  options: DateListOptions = {}
): Promise<Catalogue> {
  const { deviceId, catalogue, prompter } = context;
  const backupDir = options.backupDir ?? BACKUP_DIR;
  const category = options.category ?? DEFAULT_CATEGORY;

  const apps = getAllAppsWithDetails(deviceId);
  if (apps.length === 0) {
    console.log('No user-installed apps with a known install date were found.');
    return catalogue;
  }

  let state: PageState = { page: 1, totalPages: countPages(apps.length) };
  let showPage = true;

  for (;;) {
    if (showPage) {
      renderPage(apps, state);
    }
    printMenu();
    showPage = true;

    const choice = (await prompter.ask('Choose an option: ')).trim().toLowerCase();
    switch (choice) {
      case 'n':
        state = nextPage(state);
        break;
      case 'p':
        state = prevPage(state);
        break;
      case 'u':
      case 'b':
        state = await uninstallFromList(context, apps, state, {
          backup: choice === 'b',
          backupDir,
          category,
        });
        break;
      case 'q':
        return catalogue;
      default:
        console.log('Invalid option.');
        showPage = false;
    }
  }
}
