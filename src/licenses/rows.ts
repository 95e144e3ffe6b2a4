/**
 * License sheet row normalization
 *
 * The registry sheet has a fixed column layout: a few title rows, a header row
 * starting with "Номер лицензии", then one row per managed house. Columns are
 * mapped by position, so a change in the remote column count shifts every
 * field after the change.
 */

import * as XLSX from "xlsx";

import { DateFormatError } from "../errors.js";
import { licensesLogger } from "../logger.js";

import type {
  LicenseRecord,
  LicenseRow,
  LicenseRowDates,
  LicenseRowText,
} from "../types/index.js";

export const HEADER_MARKER = "номер лицензии";
export const IN_REGISTER_MARK = "размещена";
export const HOUSE_FIAS_ID_STUB = "";

/** Largest instant a JavaScript Date can hold (+275760-09-13T00:00:00.000Z) */
export const MAX_DATE_MS = 8.64e15;

/**
 * Date stored for blank date cells; a new instance on every call
 */
export function maxDate(): Date {
  return new Date(MAX_DATE_MS);
}

// Trailing columns of every sheet row carry nothing we model
const TRAILING_CELLS = 2;

type SourceColumn = keyof LicenseRowText | keyof LicenseRowDates;

/**
 * Sheet columns in order, after the trailing cells are dropped
 */
export const SOURCE_COLUMNS = [
  "licenseNumber",
  "licenseDate",
  "licenseStatus",
  "licenseIncludedDate",
  "orderNumber",
  "orderDate",
  "licenseJuristicAddress",
  "licenseHolderUid",
  "additionalInfo",
  "licenseHolderName",
  "inn",
  "ogrn",
  "mkdAddress",
  "gosUslugiHouseCode",
  "mkdIncludedRegisterDate",
  "mkdBeginManagementDate",
  "mkdEndManagementDate",
  "mkdExcludedRegisterDate",
  "mkdExcludedReason",
  "state198Info",
] as const satisfies readonly SourceColumn[];

export interface LocaleDatePattern {
  label: string;
  regex: RegExp;
}

export const LOCALE_DATE: LocaleDatePattern = {
  label: "DD.MM.YYYY",
  regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/,
};

export const LOCALE_DATETIME: LocaleDatePattern = {
  label: "DD.MM.YYYY HH:MM:SS",
  regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/,
};

// Number formats date cells are rendered with, matching the patterns above
const DATE_CELL_FORMAT = "dd.mm.yyyy";
const DATETIME_CELL_FORMAT = "dd.mm.yyyy hh:mm:ss";

/**
 * Raw row as read from the sheet
 */
export interface SheetRow {
  /** 1-based row number in the sheet */
  number: number;
  values: string[];
}

export function normalizeText(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Text of a cell; numbers keep every digit (INN/OGRN are often stored as numbers).
 * Date-formatted numeric cells are rendered as dd.mm.yyyy, with the time of day
 * when their format shows hours. Workbooks must be read with `cellNF` so the
 * number format is available.
 */
export function cellText(cell: XLSX.CellObject | undefined): string {
  if (
    cell === undefined ||
    cell.v === undefined ||
    cell.t === "z" ||
    cell.t === "e"
  ) {
    return "";
  }

  if (
    cell.t === "n" &&
    typeof cell.v === "number" &&
    typeof cell.z === "string" &&
    XLSX.SSF.is_date(cell.z)
  ) {
    const format = /h/i.test(cell.z) ? DATETIME_CELL_FORMAT : DATE_CELL_FORMAT;
    return String(XLSX.SSF.format(format, cell.v));
  }

  if (cell.v instanceof Date) {
    return cell.w ?? cell.v.toISOString();
  }

  return String(cell.v);
}

/**
 * Iterate the physical rows of a sheet top to bottom.
 * Every row starts at column A so positions line up across rows.
 */
export function* readSheetRows(sheet: XLSX.WorkSheet): Generator<SheetRow> {
  const ref = sheet["!ref"];
  if (ref === undefined) {
    return;
  }

  const range = XLSX.utils.decode_range(ref);
  for (let r = range.s.r; r <= range.e.r; r++) {
    const values: string[] = [];
    for (let c = 0; c <= range.e.c; c++) {
      const cell: XLSX.CellObject | undefined =
        sheet[XLSX.utils.encode_cell({ r, c })];
      values.push(cellText(cell));
    }
    yield { number: r + 1, values };
  }
}

/**
 * Parse a day.month.year date (optionally with time) as UTC.
 * Returns null when the value does not match the pattern or is not a real
 * calendar date.
 */
export function parseLocaleDate(
  value: string,
  pattern: LocaleDatePattern
): Date | null {
  const match = pattern.regex.exec(value);
  if (match === null) {
    return null;
  }

  const [day = 0, month = 0, year = 0, hours = 0, minutes = 0, seconds = 0] =
    match.slice(1).map(Number);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);

  // Rejects 31.02 and friends, which Date would roll over
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

function parseDateField(
  field: keyof LicenseRowDates,
  value: string,
  pattern: LocaleDatePattern,
  row: number
): Date {
  if (value === "") {
    return maxDate();
  }

  const date = parseLocaleDate(value, pattern);
  if (date === null) {
    throw new DateFormatError(field, value, pattern.label, row);
  }

  return date;
}

export function isHeaderRow(row: SheetRow): boolean {
  return normalizeText(row.values[0] ?? "") === HEADER_MARKER;
}

/**
 * Advance the iterator past the header row.
 * Returns false when the rows ran out before a header was seen.
 */
export function skipHeader(rows: Iterator<SheetRow>): boolean {
  for (let next = rows.next(); next.done !== true; next = rows.next()) {
    if (isHeaderRow(next.value)) {
      return true;
    }
  }

  return false;
}

/**
 * Build a license row from a raw sheet row
 */
export function makeLicenseRow(row: SheetRow): LicenseRow {
  const values = row.values.slice(0, -TRAILING_CELLS).map(normalizeText);
  const field = (name: (typeof SOURCE_COLUMNS)[number]): string =>
    values[SOURCE_COLUMNS.indexOf(name)] ?? "";

  const licenseStatus = field("licenseStatus");

  return Object.freeze({
    numberInFile: row.number,
    houseFiasId: HOUSE_FIAS_ID_STUB,
    licenseNumber: field("licenseNumber"),
    licenseDate: field("licenseDate"),
    licenseStatus,
    licenseIncludedDate: field("licenseIncludedDate"),
    orderNumber: field("orderNumber"),
    orderDate: field("orderDate"),
    licenseJuristicAddress: field("licenseJuristicAddress"),
    licenseHolderUid: field("licenseHolderUid"),
    additionalInfo: field("additionalInfo"),
    licenseHolderName: field("licenseHolderName"),
    inn: field("inn"),
    ogrn: field("ogrn"),
    mkdAddress: field("mkdAddress"),
    gosUslugiHouseCode: field("gosUslugiHouseCode"),
    mkdIncludedRegisterDate: parseDateField(
      "mkdIncludedRegisterDate",
      field("mkdIncludedRegisterDate"),
      LOCALE_DATETIME,
      row.number
    ),
    mkdBeginManagementDate: parseDateField(
      "mkdBeginManagementDate",
      field("mkdBeginManagementDate"),
      LOCALE_DATE,
      row.number
    ),
    mkdEndManagementDate: parseDateField(
      "mkdEndManagementDate",
      field("mkdEndManagementDate"),
      LOCALE_DATE,
      row.number
    ),
    mkdExcludedRegisterDate: parseDateField(
      "mkdExcludedRegisterDate",
      field("mkdExcludedRegisterDate"),
      LOCALE_DATETIME,
      row.number
    ),
    mkdExcludedReason: field("mkdExcludedReason"),
    state198Info: field("state198Info"),
    isInformationInRegister: licenseStatus === IN_REGISTER_MARK,
  });
}

/**
 * Lazily normalize the rows following the header row.
 * A sheet without a header row yields nothing.
 */
export function* normalizeLicenseRows(
  rows: Iterable<SheetRow>
): Generator<LicenseRow> {
  const iterator = rows[Symbol.iterator]();

  try {
    if (!skipHeader(iterator)) {
      licensesLogger.warn("License header row not found, no rows produced");
      return;
    }

    for (let next = iterator.next(); next.done !== true; next = iterator.next()) {
      yield makeLicenseRow(next.value);
    }
  } finally {
    iterator.return?.();
  }
}

/**
 * Convert a row to its snake_case JSON record
 */
export function toLicenseRecord(row: LicenseRow): LicenseRecord {
  return {
    number_in_file: row.numberInFile,
    house_fias_id: row.houseFiasId,
    license_number: row.licenseNumber,
    license_date: row.licenseDate,
    license_status: row.licenseStatus,
    license_included_date: row.licenseIncludedDate,
    order_number: row.orderNumber,
    order_date: row.orderDate,
    lisence_juristic_address: row.licenseJuristicAddress,
    license_holder_uid: row.licenseHolderUid,
    additional_info: row.additionalInfo,
    license_holder_name: row.licenseHolderName,
    inn: row.inn,
    ogrn: row.ogrn,
    mkd_address: row.mkdAddress,
    gos_uslugi_house_code: row.gosUslugiHouseCode,
    mkd_included_register_date: row.mkdIncludedRegisterDate.toISOString(),
    mkd_begin_management_date: row.mkdBeginManagementDate.toISOString(),
    mkd_end_management_date: row.mkdEndManagementDate.toISOString(),
    mkd_excluded_register_date: row.mkdExcludedRegisterDate.toISOString(),
    mkd_excluded_reason: row.mkdExcludedReason,
    state_198_info: row.state198Info,
    is_information_in_register: row.isInformationInRegister,
  };
}
