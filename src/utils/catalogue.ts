import fs from 'fs';
import { dump, load } from 'js-yaml';
import { CATALOGUE_PATH, DEFAULT_CATEGORY } from '../config';
import {
  Catalogue,
  CatalogueDocumentSchema,
  CatalogueLoadError,
  CatalogueMatch,
  CatalogueSaveError,
} from '../types';
import { errorMessage, formatError } from './error';

function unique(packages: string[]): string[] {
  return Array.from(new Set(packages));
}

/**
 * Reads the YAML catalogue. Any read, parse or schema failure is a {@link CatalogueLoadError}.
 * Duplicate identifiers inside a category are dropped.
 */
export function loadCatalogue(filePath: string = CATALOGUE_PATH): Catalogue {
  let parsed: unknown;
  try {
    parsed = load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new CatalogueLoadError(filePath, errorMessage(error));
  }

  const result = CatalogueDocumentSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const reason = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CatalogueLoadError(filePath, reason);
  }

  const { catalogue, ...extras } = result.data;
  const categories = new Map<string, string[]>();
  for (const [category, packages] of Object.entries(catalogue ?? {})) {
    categories.set(category, unique(packages ?? []));
  }

  const keyOrder = typeof parsed === 'object' && parsed !== null ? Object.keys(parsed) : [];

  return { path: filePath, categories, extras, keyOrder };
}

function toDocument(catalogue: Catalogue): Record<string, unknown> {
  const document: Record<string, unknown> = {};
  for (const key of [...catalogue.keyOrder, 'catalogue', ...Object.keys(catalogue.extras)]) {
    if (key in document) {
      continue;
    }
    if (key === 'catalogue') {
      document.catalogue = Object.fromEntries(catalogue.categories);
    } else if (key in catalogue.extras) {
      document[key] = catalogue.extras[key];
    }
  }
  return document;
}

// Rewrites the whole file, keeping the top-level key order it was loaded with
export function saveCatalogue(catalogue: Catalogue): void {
  const document = toDocument(catalogue);

  try {
    fs.writeFileSync(catalogue.path, dump(document, { sortKeys: false, lineWidth: -1 }), 'utf8');
  } catch (error) {
    throw new CatalogueSaveError(catalogue.path, errorMessage(error));
  }
}

// Returns false when the package is already listed under the category
export function addToCatalogue(
  catalogue: Catalogue,
  packageName: string,
  category: string = DEFAULT_CATEGORY
): boolean {
  const packages = catalogue.categories.get(category) ?? [];
  if (packages.includes(packageName)) {
    return false;
  }

  catalogue.categories.set(category, [...packages, packageName]);
  return true;
}

export function recordUninstalledPackage(
  catalogue: Catalogue,
  packageName: string,
  category: string = DEFAULT_CATEGORY
): void {
  const previous = catalogue.categories.get(category);
  if (!addToCatalogue(catalogue, packageName, category)) {
    return;
  }

  try {
    saveCatalogue(catalogue);
    console.log(`\nPackage ${packageName} has been added to the catalogue under '${category}'`);
  } catch (error) {
    // Roll back so a later call retries the write
    if (previous === undefined) {
      catalogue.categories.delete(category);
    } else {
      catalogue.categories.set(category, previous);
    }
    console.error(formatError(error));
  }
}

export function findCatalogueMatches(
  catalogue: Catalogue,
  installedPackages: string[]
): CatalogueMatch[] {
  const installed = new Set(installedPackages);
  const matches: CatalogueMatch[] = [];

  for (const [category, packages] of catalogue.categories) {
    for (const packageName of packages) {
      if (installed.has(packageName)) {
        matches.push({ category, packageName });
      }
    }
  }

  return matches;
}
