export { loadCatalog, compileCatalog, readCatalogDocument, CatalogLoadError } from "./loader";
export { CatalogValidationError } from "@/utils/catalogValidation";
