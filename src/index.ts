export { GosUslugiClient, type GosUslugiClientOptions } from "./scraper/client.js";
export {
  HttpClient,
  HttpResponse,
  buildUrl,
  type HttpClientOptions,
  type RequestOptions,
  type BodyRequestOptions,
} from "./scraper/http.js";
export {
  REGIONS,
  listRegions,
  resolveRegions,
  formatRegionCode,
} from "./licenses/regions.js";
export {
  LicenseWorkbook,
  extractWorkbooks,
  WORKBOOK_EXTENSION,
} from "./licenses/workbooks.js";
export {
  MAX_DATE_MS,
  maxDate,
  HEADER_MARKER,
  IN_REGISTER_MARK,
  makeLicenseRow,
  normalizeLicenseRows,
  parseLocaleDate,
  toLicenseRecord,
} from "./licenses/rows.js";
export { loadConfig, type ClientConfig } from "./config.js";
export * from "./errors.js";
export type * from "./types/index.js";
