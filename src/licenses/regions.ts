/**
 * Region reference table and region code validation
 */

import { readFileSync } from "node:fs";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { RegionNotFoundError } from "../errors.js";

import type { Region } from "../types/index.js";

const RegionTableSchema = Type.Array(
  Type.Object({
    code: Type.Integer({ minimum: 1, maximum: 99 }),
    name: Type.String({ minLength: 1 }),
  })
);

const REGIONS_FILE = new URL("../../data/regions.json", import.meta.url);

/**
 * Build the frozen code → region map from raw table entries
 */
export function buildRegionTable(entries: unknown): ReadonlyMap<number, Region> {
  if (!Value.Check(RegionTableSchema, entries)) {
    const [first] = Value.Errors(RegionTableSchema, entries);
    throw new Error(
      `Invalid region reference table: ${first !== undefined ? `${first.path} ${first.message}` : "unknown error"}`
    );
  }

  const table = new Map<number, Region>();
  for (const entry of entries) {
    if (table.has(entry.code)) {
      throw new Error(
        `Invalid region reference table: duplicate code ${String(entry.code)}`
      );
    }
    table.set(entry.code, Object.freeze({ code: entry.code, name: entry.name }));
  }

  return table;
}

function loadRegionTable(): ReadonlyMap<number, Region> {
  const raw: unknown = JSON.parse(readFileSync(REGIONS_FILE, "utf-8"));
  return buildRegionTable(raw);
}

export const REGIONS: ReadonlyMap<number, Region> = loadRegionTable();

/**
 * All reference regions ordered by code
 */
export function listRegions(): Region[] {
  return [...REGIONS.values()].sort((a, b) => a.code - b.code);
}

/**
 * Validate requested codes against the reference table.
 * Fails on the first unknown code; nothing is returned unless every code is known.
 */
export function resolveRegions(
  codes: Iterable<number>,
  table: ReadonlyMap<number, Region> = REGIONS
): Region[] {
  const regions: Region[] = [];

  for (const code of codes) {
    const region = table.get(code);
    if (region === undefined) {
      throw new RegionNotFoundError(code);
    }
    regions.push(region);
  }

  return regions;
}

/**
 * Two-digit region code used in portal URLs (5 -> "05")
 */
export function formatRegionCode(code: number): string {
  return String(code).padStart(2, "0");
}
