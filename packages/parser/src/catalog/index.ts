export { CatalogParser, type CatalogParseResult } from "./parser";
