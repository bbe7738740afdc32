import { Catalogue } from '../types';
import { listInstalledPackages, uninstallPackage } from '../utils/adb';
import { findCatalogueMatches } from '../utils/catalogue';
import { confirm } from '../utils/prompt';
import { ModeContext } from './context';
import { runHunterMode } from './hunter';

// Uninstalls every installed package the catalogue lists, after a single confirmation
export async function runCatalogueMode(context: ModeContext): Promise<Catalogue> {
  const { deviceId, catalogue, prompter } = context;

  const matches = findCatalogueMatches(catalogue, listInstalledPackages(deviceId));
  for (const { category, packageName } of matches) {
    console.log(`[${category}] ${packageName}`);
  }

  if (matches.length === 0) {
    console.log('No matching packages found.');
    if (await confirm(prompter, 'Would you like to switch to hunter mode to detect running apps?')) {
      return runHunterMode(context);
    }
    return catalogue;
  }

  if (!(await confirm(prompter, '\nDo you want to uninstall these packages?'))) {
    console.log('Operation cancelled.');
    return catalogue;
  }

  console.log('\nUninstalling packages...');
  for (const { category, packageName } of matches) {
    process.stdout.write(`Uninstalling [${category}] ${packageName}... `);
    console.log(uninstallPackage(deviceId, packageName) ? 'Success' : 'Failed');
  }

  return catalogue;
}
