// dom.gosuslugi.ru license registry types

// =====================
// Reference Types
// =====================

/**
 * Region of the federation as listed in the reference table
 */
export interface Region {
  readonly code: number;
  readonly name: string;
}

/**
 * Opaque token returned by the license lookup endpoint; only ever sent back
 * to the archive download endpoint
 */
export type LicenseUid = string;

// =====================
// License Row Types
// =====================

/**
 * Text columns of the license sheet, in sheet order.
 * The four date columns sit between gosUslugiHouseCode and mkdExcludedReason.
 */
export interface LicenseRowText {
  licenseNumber: string;
  licenseDate: string;
  licenseStatus: string;
  licenseIncludedDate: string;
  orderNumber: string;
  orderDate: string;
  licenseJuristicAddress: string;
  licenseHolderUid: string;
  additionalInfo: string;
  licenseHolderName: string;
  inn: string;
  ogrn: string;
  mkdAddress: string;
  gosUslugiHouseCode: string;
  mkdExcludedReason: string;
  state198Info: string;
}

export interface LicenseRowDates {
  mkdIncludedRegisterDate: Date;
  mkdBeginManagementDate: Date;
  mkdEndManagementDate: Date;
  mkdExcludedRegisterDate: Date;
}

/**
 * One normalized row of a region's license sheet
 */
export interface LicenseRow extends LicenseRowText, LicenseRowDates {
  /** Physical 1-based row number in the sheet */
  numberInFile: number;
  /** Reserved for FIAS matching; never read from the sheet */
  houseFiasId: string;
  isInformationInRegister: boolean;
}

/**
 * JSON-friendly form of a license row, keyed the way the registry columns are
 * named downstream
 */
export interface LicenseRecord {
  number_in_file: number;
  house_fias_id: string;
  license_number: string;
  license_date: string;
  license_status: string;
  license_included_date: string;
  order_number: string;
  order_date: string;
  lisence_juristic_address: string;
  license_holder_uid: string;
  additional_info: string;
  license_holder_name: string;
  inn: string;
  ogrn: string;
  mkd_address: string;
  gos_uslugi_house_code: string;
  mkd_included_register_date: string;
  mkd_begin_management_date: string;
  mkd_end_management_date: string;
  mkd_excluded_register_date: string;
  mkd_excluded_reason: string;
  state_198_info: string;
  is_information_in_register: boolean;
}

// =====================
// Portal JSON
// =====================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Parsed body of a portal read operation; an empty body yields ""
 */
export type PortalResponse = JsonValue;
