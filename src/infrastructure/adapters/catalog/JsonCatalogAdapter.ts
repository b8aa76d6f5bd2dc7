import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { EducationCatalogSchema, OfferCatalogSchema } from '../../../application/dto/CatalogDTO.js';
import type { CatalogPort } from '../../../application/ports/CatalogPort.js';
import type { Catalog } from '../../../domain/entities/CatalogItem.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CATALOG_DIR = path.resolve(__dirname, '../../../../data/catalog');

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }

  return value;
};

const readJson = (filePath: string): unknown => JSON.parse(fs.readFileSync(filePath, 'utf8'));

/** Loads and validates the catalog once; the result is frozen and shared by every request. */
export const loadCatalog = (directory: string = DEFAULT_CATALOG_DIR): Catalog => {
  const educationPath = path.join(directory, 'education.json');
  const offersPath = path.join(directory, 'offers.json');

  const education = EducationCatalogSchema.safeParse(readJson(educationPath));
  if (!education.success) {
    throw new Error(`Invalid catalog file ${educationPath}: ${education.error.message}`);
  }

  const offers = OfferCatalogSchema.safeParse(readJson(offersPath));
  if (!offers.success) {
    throw new Error(`Invalid catalog file ${offersPath}: ${offers.error.message}`);
  }

  const catalog: Catalog = { education: education.data, offers: offers.data };

  console.log('📚 Content catalog loaded', {
    directory,
    education: catalog.education.length,
    offers: catalog.offers.length,
  });

  return deepFreeze(catalog);
};

export class JsonCatalogAdapter implements CatalogPort {
  private readonly catalog: Catalog;

  constructor(directory?: string) {
    this.catalog = loadCatalog(directory);
  }

  getCatalog(): Catalog {
    return this.catalog;
  }
}
