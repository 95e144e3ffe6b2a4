/**
 * Workbook extraction from per-region license archives
 */

import AdmZip from "adm-zip";
import * as XLSX from "xlsx";

import {
  ArchiveError,
  NoWorksheetError,
  WorkbookClosedError,
} from "../errors.js";
import { licensesLogger } from "../logger.js";

import { normalizeLicenseRows, readSheetRows } from "./rows.js";

import type { LicenseRow } from "../types/index.js";

export const WORKBOOK_EXTENSION = ".xlsx";

/**
 * An open license workbook of one region.
 *
 * The handle is scoped: it is closed once its rows are exhausted or abandoned,
 * or when the extractor moves on to the next workbook.
 */
export class LicenseWorkbook {
  readonly regionName: string;
  readonly memberName: string;
  private workbook: XLSX.WorkBook | null;
  private reading = false;

  constructor(regionName: string, workbook: XLSX.WorkBook, memberName = "") {
    this.regionName = regionName;
    this.workbook = workbook;
    this.memberName = memberName;
  }

  get closed(): boolean {
    return this.workbook === null;
  }

  close(): void {
    if (this.workbook !== null) {
      licensesLogger.debug(
        { regionName: this.regionName, member: this.memberName },
        "Closing license workbook"
      );
    }
    this.workbook = null;
  }

  /**
   * Normalized rows of the first worksheet.
   * Single pass: only one row sequence is handed out per workbook, and the
   * workbook is closed when that sequence ends.
   */
  rows(): Generator<LicenseRow> {
    if (this.workbook === null || this.reading) {
      throw new WorkbookClosedError(this.regionName);
    }
    this.reading = true;

    return this.readRows();
  }

  private *readRows(): Generator<LicenseRow> {
    try {
      const workbook = this.workbook;
      if (workbook === null) {
        throw new WorkbookClosedError(this.regionName);
      }

      const sheetName = workbook.SheetNames[0];
      const sheet =
        sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
      if (sheet === undefined) {
        throw new NoWorksheetError(this.regionName);
      }

      yield* normalizeLicenseRows(readSheetRows(sheet));
    } finally {
      this.close();
    }
  }
}

function openArchive(regionName: string, content: Buffer): AdmZip {
  try {
    return new AdmZip(content);
  } catch (error) {
    throw new ArchiveError(regionName, error);
  }
}

/**
 * Parse one spreadsheet member. Number formats are kept so date cells can be
 * told apart from plain numbers.
 */
function readWorkbook(
  regionName: string,
  entry: AdmZip.IZipEntry
): XLSX.WorkBook {
  try {
    return XLSX.read(entry.getData(), { type: "buffer", cellNF: true });
  } catch (error) {
    throw new ArchiveError(regionName, error, entry.entryName);
  }
}

export function isWorkbookMember(name: string): boolean {
  return name.toLowerCase().endsWith(WORKBOOK_EXTENSION);
}

/**
 * Lazily yield one workbook per spreadsheet member of each archive.
 * An archive is only opened when the consumer asks for its first workbook.
 */
export function* extractWorkbooks(
  archives: Iterable<[string, Buffer]>
): Generator<LicenseWorkbook> {
  for (const [regionName, content] of archives) {
    const zip = openArchive(regionName, content);
    const members = zip
      .getEntries()
      .filter((entry) => !entry.isDirectory && isWorkbookMember(entry.entryName));

    licensesLogger.debug(
      {
        regionName,
        members: members.map((entry) => entry.entryName),
      },
      "Opened licenses archive"
    );

    if (members.length === 0) {
      licensesLogger.warn({ regionName }, "No workbook found in archive");
    }

    for (const member of members) {
      const workbook = new LicenseWorkbook(
        regionName,
        readWorkbook(regionName, member),
        member.entryName
      );

      try {
        yield workbook;
      } finally {
        workbook.close();
      }
    }
  }
}
