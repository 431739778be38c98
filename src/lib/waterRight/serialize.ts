import type {
  DamTargets,
  Duration,
  LegalDepartment,
  OrFallback,
  PhValues,
  Quantity,
  Rate,
  RateRecord,
  SingleOrPair,
  UsageLocation,
  WaterRight,
} from '../../types/waterRight';
import { legalDepartmentsOf } from './model';
import { parseDuration, serializeDuration } from './rate';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function rateToJson(rate: Rate): JsonValue {
  return [rate.value, rate.measurement, serializeDuration(rate.per)];
}

export function rateFromJson(json: unknown): Rate | null {
  if (!Array.isArray(json) || json.length !== 3) return null;
  const [value, measurement, code]: unknown[] = json;
  if (typeof value !== 'number' || typeof measurement !== 'string' || typeof code !== 'string') return null;
  const per: Duration | null = parseDuration(code);
  return per ? { value, measurement, per } : null;
}

export function quantityToJson(quantity: Quantity): JsonValue {
  return [quantity.value, quantity.unit];
}

export function singleOrPairToJson<A extends JsonValue, B extends JsonValue>(value: SingleOrPair<A, B>): JsonValue {
  return value.kind === 'single' ? [value.value] : [value.first, value.second];
}

export function orFallbackToJson<T>(value: OrFallback<T>, toJson: (expected: T) => JsonValue): JsonValue {
  return value.kind === 'expected' ? toJson(value.value) : value.raw;
}

/**
 * Reads a persisted `OrFallback`. Anything `decode` rejects is a fallback when
 * it is a string; other shapes are not a valid encoding.
 */
export function orFallbackFromJson<T>(json: unknown, decode: (json: unknown) => T | null): OrFallback<T> | null {
  const value = decode(json);
  if (value !== null) return { kind: 'expected', value };
  if (typeof json === 'string') return { kind: 'fallback', raw: json };
  return null;
}

function rateRecordToJson(record: RateRecord): JsonValue[] {
  return record.map((entry) => orFallbackToJson(entry, rateToJson));
}

function damTargetsToJson(targets: DamTargets): JsonObject {
  const json: JsonObject = {};
  if (targets.default) json.default = quantityToJson(targets.default);
  if (targets.steady) json.steady = quantityToJson(targets.steady);
  if (targets.max) json.max = quantityToJson(targets.max);
  return json;
}

function phValuesToJson(values: PhValues): JsonObject {
  const json: JsonObject = {};
  if (values.min !== undefined) json.min = values.min;
  if (values.max !== undefined) json.max = values.max;
  return json;
}

/** Drops undefined members, empty arrays and empty objects. */
function compact(entries: Record<string, JsonValue | undefined>): JsonObject {
  const json: JsonObject = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value === undefined) continue;
    if (Array.isArray(value) && value.length === 0) continue;
    if (value !== null && typeof value === 'object' && !Array.isArray(value) && Object.keys(value).length === 0) {
      continue;
    }
    json[key] = value;
  }
  return json;
}

export function usageLocationToJson(location: UsageLocation): JsonObject {
  return compact({
    no: location.no,
    serial: location.serial,
    active: location.active,
    real: location.real,
    name: location.name,
    legalPurpose: location.legalPurpose,
    mapExcerpt: location.mapExcerpt && singleOrPairToJson(location.mapExcerpt),
    municipalArea: location.municipalArea,
    county: location.county,
    landRecord:
      location.landRecord &&
      orFallbackToJson(location.landRecord, (record) => ({ district: record.district, field: record.field })),
    plot: location.plot,
    maintenanceAssociation: location.maintenanceAssociation,
    euSurveyArea: location.euSurveyArea,
    catchmentAreaCode: location.catchmentAreaCode && singleOrPairToJson(location.catchmentAreaCode),
    regulationCitation: location.regulationCitation,
    withdrawalRates: rateRecordToJson(location.withdrawalRates),
    pumpingRates: rateRecordToJson(location.pumpingRates),
    injectionRates: rateRecordToJson(location.injectionRates),
    wasteWaterFlowVolume: rateRecordToJson(location.wasteWaterFlowVolume),
    riverBasin: location.riverBasin,
    groundwaterBody: location.groundwaterBody,
    waterBody: location.waterBody,
    floodArea: location.floodArea,
    waterProtectionArea: location.waterProtectionArea,
    damTargetLevels: damTargetsToJson(location.damTargetLevels),
    fluidDischarge: rateRecordToJson(location.fluidDischarge),
    rainSupplement: rateRecordToJson(location.rainSupplement),
    irrigationArea: location.irrigationArea && quantityToJson(location.irrigationArea),
    phValues: location.phValues && phValuesToJson(location.phValues),
    injectionLimits: location.injectionLimits.map(([substance, limit]) => [substance, quantityToJson(limit)]),
    utmEasting: location.utmEasting,
    utmNorthing: location.utmNorthing,
  });
}

function legalDepartmentToJson(department: LegalDepartment): JsonObject {
  return {
    abbreviation: department.abbreviation,
    description: department.description,
    usageLocations: department.usageLocations.map(usageLocationToJson),
  };
}

export function waterRightToJson(waterRight: WaterRight): JsonObject {
  const departments: JsonObject = {};
  for (const department of legalDepartmentsOf(waterRight)) {
    departments[department.abbreviation] = legalDepartmentToJson(department);
  }

  return compact({
    no: waterRight.no,
    holder: waterRight.holder,
    validUntil: waterRight.validUntil,
    status: waterRight.status,
    validFrom: waterRight.validFrom,
    legalTitle: waterRight.legalTitle,
    waterAuthority: waterRight.waterAuthority,
    registeringAuthority: waterRight.registeringAuthority,
    grantingAuthority: waterRight.grantingAuthority,
    initiallyGranted: waterRight.initiallyGranted,
    lastChange: waterRight.lastChange,
    fileReference: waterRight.fileReference,
    externalIdentifier: waterRight.externalIdentifier,
    subject: waterRight.subject,
    address: waterRight.address,
    legalDepartments: departments,
    annotation: waterRight.annotation,
  });
}
