import pkg from '../package.json';
import { ModeContext } from './modes/context';
import { runCatalogueMode } from './modes/catalogue';
import { runDateListMode } from './modes/date-list';
import { runHunterMode } from './modes/hunter';
import { ADBNotFoundError, Catalogue } from './types';
import { checkADBInstalled, waitForDevice } from './utils/adb';
import { loadCatalogue } from './utils/catalogue';
import { formatError, isAbortError, isFatalError } from './utils/error';
import { createTerminalPrompter, Prompter } from './utils/prompt';

interface Mode {
  description: string;
  run: (context: ModeContext) => Promise<Catalogue>;
}

export type PrompterFactory = (controller: AbortController) => Prompter;

const MODES = new Map<string, Mode>([
  ['1', { description: 'Catalogue mode (check against known packages)', run: runCatalogueMode }],
  ['2', { description: 'Hunter mode (monitor current app)', run: context => runHunterMode(context) }],
  ['3', { description: 'List mode (user apps by install date)', run: context => runDateListMode(context) }],
]);

export const USAGE = `Usage: apk-hunter

Interactive tool for removing unwanted apps from a connected Android device over adb.

Environment:
  ADB_PATH               adb binary (default: adb)
  ADB_TIMEOUT_MS         timeout for adb calls, 0 for none (default: 0)
  APK_HUNTER_CATALOGUE   catalogue file (default: ./catalogue.yaml)
  APK_HUNTER_BACKUP_DIR  APK backup directory (default: ./apk_backups)
  APK_HUNTER_DEBUG       set to 1 to log every adb call`;

async function selectMode(prompter: Prompter): Promise<Mode> {
  console.log('\nSelect mode:');
  for (const [key, mode] of MODES) {
    console.log(`${key}. ${mode.description}`);
  }

  for (;;) {
    const choice = (await prompter.ask(`Enter mode (${[...MODES.keys()].join('/')}): `)).trim();
    const mode = MODES.get(choice);
    if (mode) {
      return mode;
    }
    console.log(`Invalid mode '${choice}'.`);
  }
}

async function startSession(createPrompter: PrompterFactory): Promise<void> {
  if (!checkADBInstalled()) {
    throw new ADBNotFoundError();
  }

  const catalogue = loadCatalogue();

  console.log('Waiting for Android device...');
  const deviceId = waitForDevice();
  console.log(`Connected to device: ${deviceId}`);

  const controller = new AbortController();
  const prompter = createPrompter(controller);
  try {
    const mode = await selectMode(prompter);
    await mode.run({ deviceId, catalogue, prompter, signal: controller.signal });
  } finally {
    prompter.close();
  }
}

/**
 * Runs the interactive tool and resolves to the process exit status:
 * 0 on completion or cancellation, 1 when a fatal error ends the session.
 */
export async function run(
  args: string[],
  createPrompter: PrompterFactory = createTerminalPrompter
): Promise<number> {
  if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
    console.log(pkg.version);
    return 0;
  }
  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  try {
    await startSession(createPrompter);
    return 0;
  } catch (error) {
    if (isAbortError(error)) {
      console.log('\nCancelled.');
      return 0;
    }
    console.error(formatError(error));
    return isFatalError(error) ? 1 : 0;
  }
}
