/**
 * Error classes raised by the license pipeline and the portal client
 */

export class RegionNotFoundError extends Error {
  code = "REGION_NOT_FOUND" as const;
  regionCode: number;

  constructor(regionCode: number) {
    super(`Region code ${String(regionCode)} is absent in reference`);
    this.name = "RegionNotFoundError";
    this.regionCode = regionCode;
  }
}

export class TransportError extends Error {
  code = "TRANSPORT_FAILURE" as const;
  method: string;
  url: string;

  constructor(method: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${method} ${url} failed: ${reason}`, { cause });
    this.name = "TransportError";
    this.method = method;
    this.url = url;
  }
}

export class RemoteResponseError extends Error {
  code = "REMOTE_NON_SUCCESS" as const;
  status: number;
  url: string;

  constructor(status: number, url: string) {
    super(`Request to ${url} returned HTTP ${String(status)}`);
    this.name = "RemoteResponseError";
    this.status = status;
    this.url = url;
  }
}

export class ArchiveError extends Error {
  code = "ARCHIVE_ERROR" as const;
  regionName: string;
  memberName: string | undefined;

  constructor(regionName: string, cause: unknown, memberName?: string) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const source = memberName === undefined ? "" : ` (${memberName})`;
    super(`Cannot read licenses archive for ${regionName}${source}: ${reason}`, {
      cause,
    });
    this.name = "ArchiveError";
    this.regionName = regionName;
    this.memberName = memberName;
  }
}

export class NoWorksheetError extends Error {
  code = "NO_WORKSHEET" as const;

  constructor(regionName: string) {
    super(`There is no worksheet in the licenses workbook for ${regionName}`);
    this.name = "NoWorksheetError";
  }
}

export class WorkbookClosedError extends Error {
  code = "WORKBOOK_CLOSED" as const;

  constructor(regionName: string) {
    super(`Licenses workbook for ${regionName} is already closed`);
    this.name = "WorkbookClosedError";
  }
}

export class DateFormatError extends Error {
  code = "DATE_FORMAT" as const;
  field: string;
  value: string;

  constructor(field: string, value: string, pattern: string, row?: number) {
    const location = row !== undefined ? ` in row ${String(row)}` : "";
    super(
      `Value "${value}" of ${field}${location} does not match ${pattern}`
    );
    this.name = "DateFormatError";
    this.field = field;
    this.value = value;
  }
}
