import { usageLocationsOf } from '../waterRight/model';
import { splitCodeAndName } from '../parse/sanitize';
import type { ReportWarning } from '../../types/report';
import type { UsageLocation, WaterRight } from '../../types/waterRight';
import type { EnrichmentRow, EnrichmentTable } from './table';

export interface EnrichmentResult {
  /** At least one spreadsheet row belongs to the water right. */
  enriched: boolean;
  warnings: ReportWarning[];
}

function fillRoot(waterRight: WaterRight, row: EnrichmentRow): void {
  waterRight.holder = waterRight.holder ?? row.rightsHolder;
  waterRight.validUntil = waterRight.validUntil ?? row.validUntil;
  waterRight.status = waterRight.status ?? row.status;
  waterRight.validFrom = waterRight.validFrom ?? row.validFrom;
  waterRight.legalTitle = waterRight.legalTitle ?? row.legalTitle;
  waterRight.waterAuthority = waterRight.waterAuthority ?? row.waterAuthority;
  waterRight.grantingAuthority = waterRight.grantingAuthority ?? row.grantingAuthority;
  waterRight.lastChange = waterRight.lastChange ?? row.dateOfChange;
  waterRight.fileReference = waterRight.fileReference ?? row.fileReference;
  waterRight.externalIdentifier = waterRight.externalIdentifier ?? row.externalIdentifier;
  waterRight.address = waterRight.address ?? row.address;
}

function fillUsageLocation(location: UsageLocation, row: EnrichmentRow): void {
  location.no = location.no ?? row.usageLocationNo;
  if (location.legalPurpose === undefined && row.legalPurpose !== undefined) {
    location.legalPurpose = splitCodeAndName(row.legalPurpose);
  }
  location.county = location.county ?? row.county;
  location.riverBasin = location.riverBasin ?? row.riverBasin;
  location.groundwaterBody = location.groundwaterBody ?? row.groundwaterBody;
  location.floodArea = location.floodArea ?? row.floodArea;
  location.waterProtectionArea = location.waterProtectionArea ?? row.waterProtectionArea;
  location.utmEasting = location.utmEasting ?? row.utmEasting;
  location.utmNorthing = location.utmNorthing ?? row.utmNorthing;

  if (location.utmEasting === 0) location.utmEasting = undefined;
  if (location.utmNorthing === 0) location.utmNorthing = undefined;
}

function matchesByName(location: UsageLocation, row: EnrichmentRow): boolean {
  return location.name !== undefined && row.usageLocation === location.name;
}

function matchesByCoordinates(location: UsageLocation, row: EnrichmentRow): boolean {
  return (
    location.utmEasting !== undefined &&
    location.utmNorthing !== undefined &&
    row.utmEasting === location.utmEasting &&
    row.utmNorthing === location.utmNorthing
  );
}

/**
 * Backfills fields the report left empty from the spreadsheet rows of the
 * same water right. Each row serves at most one usage location.
 */
export function enrichWaterRight(waterRight: WaterRight, table: EnrichmentTable): EnrichmentResult {
  const rows = table.rowsFor(waterRight.no);
  const warnings: ReportWarning[] = [];

  for (const row of rows) fillRoot(waterRight, row);

  const unclaimed = new Map<number, EnrichmentRow>();
  for (const row of rows) unclaimed.set(row.usageLocationNo, row);

  for (const location of usageLocationsOf(waterRight)) {
    const candidates = [...unclaimed.values()];
    const row =
      candidates.find((candidate) => matchesByName(location, candidate)) ??
      candidates.find((candidate) => matchesByCoordinates(location, candidate));

    if (!row) {
      warnings.push({
        type: 'usage-location-not-found',
        waterRightNo: waterRight.no,
        usageLocation: location.name,
      });
      continue;
    }

    unclaimed.delete(row.usageLocationNo);
    fillUsageLocation(location, row);
  }

  if (unclaimed.size > 0) {
    warnings.push({
      type: 'missing-usage-locations',
      waterRightNo: waterRight.no,
      missingLocations: [...unclaimed.keys()],
    });
  }

  return { enriched: rows.length > 0, warnings };
}
