export {
  loadCatalog,
  parseCatalog,
  parseCatalogLine,
  isComment,
  CatalogReadError,
} from './loader.js';
export type { Catalog } from './loader.js';
export {
  parseFoodRecord,
  parseQuantity,
  formatFoodRecord,
  FoodRecordSchema,
} from './record.js';
export type { FoodRecordFields } from './record.js';
