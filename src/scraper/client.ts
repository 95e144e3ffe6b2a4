import { randomUUID } from "node:crypto";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { loadConfig, normalizeBaseUrl } from "../config.js";
import { RemoteResponseError } from "../errors.js";
import {
  formatRegionCode,
  REGIONS,
  resolveRegions,
} from "../licenses/regions.js";
import { extractWorkbooks, type LicenseWorkbook } from "../licenses/workbooks.js";
import { licensesLogger } from "../logger.js";

import { HttpClient, type HttpResponse } from "./http.js";

import type {
  LicenseUid,
  PortalResponse,
  Region,
} from "../types/index.js";

export interface GosUslugiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Replacement for the global fetch (tests) */
  fetch?: typeof fetch;
  /** Reference table override (tests) */
  regions?: ReadonlyMap<number, Region>;
}

const HomeManagementsPageSchema = Type.Object({
  total: Type.Optional(Type.Union([Type.Integer({ minimum: 0 }), Type.Null()])),
});

/**
 * Fixed organization search criteria; only the search string varies
 */
function organizationSearchPayload(inn: string): Record<string, unknown> {
  return {
    sortCriteriaList: [
      { sortedBy: "organizationType", ascending: false },
      { sortedBy: "shortName", ascending: true },
      { sortedBy: "fullName", ascending: true },
      { sortedBy: "parentKpp", ascending: true },
      { sortedBy: "kpp", ascending: true },
    ],
    organizationStatuses: { coll: ["REGISTERED"], operand: "OR" },
    organizationTypes: { coll: ["B", "L", "A"], operand: "OR" },
    subordinationOrgTypeList: { coll: ["HEAD", "BRANCH"], operand: "OR" },
    commonSearchString: inn,
    roleConstraints: {
      coll: ["1", "19", "20", "22", "21"].map((roleCode) => ({
        roleCode,
        roleStatuses: ["APPROVED"],
      })),
      operand: "OR",
    },
  };
}

const JSON_HEADERS = { "Content-Type": "application/json" };

/**
 * Client for the public dom.gosuslugi.ru API
 */
export class GosUslugiClient {
  private readonly http: HttpClient;
  private readonly baseUrl: string;
  private readonly regions: ReadonlyMap<number, Region>;

  constructor(options: GosUslugiClientOptions = {}) {
    const config = loadConfig();
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? config.baseUrl);
    this.regions = options.regions ?? REGIONS;
    this.http = new HttpClient({
      timeoutMs: options.timeoutMs ?? config.timeoutMs,
      fetch: options.fetch,
    });
  }

  // ==========================================================================
  // License registry
  // ==========================================================================

  /**
   * Download the license archives of the given regions and return their
   * workbooks as a lazy sequence.
   * Unknown region codes are rejected before any request is made.
   */
  async getLicenses(
    regionCodes: Iterable<number>
  ): Promise<Generator<LicenseWorkbook>> {
    const regions = resolveRegions(regionCodes, this.regions);

    const uids = await this.fetchLicenseUids(regions);
    const archives = await this.fetchLicenseArchives(uids);

    licensesLogger.info(
      { requested: regions.length, downloaded: archives.size },
      "License archives downloaded"
    );

    return extractWorkbooks(archives);
  }

  /**
   * Look up the license archive uid of each region.
   * Regions answering with a non-200 status are logged and left out.
   */
  async fetchLicenseUids(
    regions: Iterable<Region>
  ): Promise<Map<string, LicenseUid>> {
    const uids = new Map<string, LicenseUid>();

    for (const region of regions) {
      const url = `${this.baseUrl}licenses/api/rest/services/public/licenses/region-license-xls/${formatRegionCode(region.code)}`;
      const response = await this.http.get(url);

      if (response.status !== 200) {
        licensesLogger.error(
          { regionCode: region.code, status: response.status },
          `uid for ${String(region.code)} was not obtained`
        );
        continue;
      }

      uids.set(region.name, response.text());
    }

    return uids;
  }

  /**
   * Download the license archive of each region.
   * Regions answering with a non-200 status are logged and left out.
   */
  async fetchLicenseArchives(
    uids: ReadonlyMap<string, LicenseUid>
  ): Promise<Map<string, Buffer>> {
    const archives = new Map<string, Buffer>();

    for (const [regionName, uid] of uids) {
      const response = await this.http.get(
        `${this.baseUrl}filestore/publicDownloadAllFilesServlet`,
        {
          params: {
            context: "licenses",
            uids: uid,
            zipFileName: `${regionName}.zip`,
          },
        }
      );

      if (response.status !== 200) {
        licensesLogger.error(
          { regionName, status: response.status },
          `License info for ${regionName} was not obtained`
        );
        continue;
      }

      archives.set(regionName, response.body);
    }

    return archives;
  }

  // ==========================================================================
  // Organizations, houses and home management
  // ==========================================================================

  async getOrganizations(inn: string): Promise<PortalResponse> {
    const response = await this.http.post(
      `${this.baseUrl}ppa/api/rest/services/ppa/organizations/chooser/search;page=1;itemsPerPage=11`,
      { body: organizationSearchPayload(inn), headers: JSON_HEADERS }
    );
    return this.responseBody(response);
  }

  async getOrganization(guid: string): Promise<PortalResponse> {
    const response = await this.http.get(
      `${this.baseUrl}ppa/api/rest/services/ppa/public/organizations/orgByGuid`,
      { params: { organizationGuid: guid } }
    );
    return this.responseBody(response);
  }

  getActualHouses(houseCode: string): Promise<PortalResponse> {
    return this.getHouses(houseCode, true);
  }

  getNotActualHouses(houseCode: string): Promise<PortalResponse> {
    return this.getHouses(houseCode, false);
  }

  /**
   * Page through the houses managed by an organization.
   * The first page's `total` decides how many more pages are requested.
   */
  async *getHomeManagements(
    organizationGuid: string,
    startPage = 1,
    perPage = 1
  ): AsyncGenerator<PortalResponse> {
    const body = { organizationGuid, calcCount: true };

    const first = await this.fetchHomeManagementsPage(startPage, perPage, body);
    yield first;

    const firstPage: unknown = first;
    if (!Value.Check(HomeManagementsPageSchema, firstPage)) {
      throw new Error("Unexpected home managements response: no total count");
    }

    const pageCount = Math.ceil((firstPage.total ?? 0) / perPage);
    for (let page = startPage + 1; page <= pageCount; page++) {
      yield await this.fetchHomeManagementsPage(page, perPage, body);
    }
  }

  async getHomeManagement(guid: string): Promise<PortalResponse> {
    const response = await this.http.get(
      `${this.baseUrl}homemanagement/api/rest/services/houses/public/1/${encodeURIComponent(guid)}/`
    );
    return this.responseBody(response);
  }

  async getHouseInfo(houseGuid: string): Promise<PortalResponse> {
    const response = await this.http.get(
      `${this.baseUrl}information-disclosure/api/rest/services/disclosures/mkd/house-info`,
      {
        params: { houseGuid },
        headers: {
          "Session-GUID": randomUUID(),
          "Request-GUID": randomUUID(),
        },
      }
    );
    return this.responseBody(response);
  }

  private async getHouses(
    houseCode: string,
    actual: boolean
  ): Promise<PortalResponse> {
    const response = await this.http.get(
      `${this.baseUrl}nsi/api/rest/services/nsi/fias/v4/houses`,
      { params: { houseCodes: houseCode, includeDuplicates: false, actual } }
    );
    return this.responseBody(response);
  }

  private async fetchHomeManagementsPage(
    page: number,
    perPage: number,
    body: Record<string, unknown>
  ): Promise<PortalResponse> {
    const response = await this.http.post(
      `${this.baseUrl}homemanagement/api/rest/services/houses/public/searchByOrg`,
      {
        params: { pageIndex: page, elementsPerPage: perPage },
        body,
        headers: JSON_HEADERS,
      }
    );
    return this.responseBody(response);
  }

  private responseBody(response: HttpResponse): PortalResponse {
    if (response.status >= 400) {
      throw new RemoteResponseError(response.status, response.url);
    }
    if (response.body.length === 0) {
      return "";
    }
    return response.json();
  }
}
