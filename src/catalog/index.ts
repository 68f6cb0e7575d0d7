export { loadCatalog, parseCatalog, toCatalogRow } from "./loader";
export { hasVideo, isFingerspellingRow, listCategories } from "./categories";
