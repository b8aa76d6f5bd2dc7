import type { Catalog } from '../../domain/entities/CatalogItem.js';

export interface CatalogPort {
  getCatalog(): Catalog;
}
