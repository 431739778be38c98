export type WaterRightNo = number;

export const LEGAL_DEPARTMENT_ABBREVIATIONS = ['A', 'B', 'C', 'D', 'E', 'F', 'K', 'L'] as const;

export type LegalDepartmentAbbreviation = (typeof LEGAL_DEPARTMENT_ABBREVIATIONS)[number];

export type DurationUnit = 'seconds' | 'minutes' | 'hours' | 'days' | 'weeks' | 'months' | 'years';

export interface Duration {
  unit: DurationUnit;
  factor: number;
}

export interface Rate<T = number> {
  value: T;
  measurement: string;
  per: Duration;
}

export interface Quantity {
  value: number;
  unit: string;
}

export type OrFallback<T> = { kind: 'expected'; value: T } | { kind: 'fallback'; raw: string };

export type SingleOrPair<A, B = A> =
  | { kind: 'single'; value: A }
  | { kind: 'pair'; first: A; second: B };

export interface LandRecord {
  district: string;
  field: number;
}

/** Kept sorted by `compareRateEntries` and free of equal entries. */
export type RateRecord = OrFallback<Rate>[];

export type CodeAndName = [code: number, name: string];

export interface DamTargets {
  default?: Quantity;
  /** Dauerstau */
  steady?: Quantity;
  /** Höchststau */
  max?: Quantity;
}

export interface PhValues {
  min?: number;
  max?: number;
}

export interface UsageLocation {
  /** Nutzungsort Nr., only known from the spreadsheet */
  no?: number;
  /** Nutzungsort Lfd. Nr. */
  serial?: string;
  active?: boolean;
  real?: boolean;
  name?: string;
  legalPurpose?: [code: string, name: string];
  /** Top. Karte 1:25.000 */
  mapExcerpt?: SingleOrPair<number, string>;
  municipalArea?: CodeAndName;
  county?: string;
  /** Gemarkung, Flur */
  landRecord?: OrFallback<LandRecord>;
  /** Flurstück */
  plot?: string;
  maintenanceAssociation?: CodeAndName;
  euSurveyArea?: CodeAndName;
  catchmentAreaCode?: SingleOrPair<number, string>;
  regulationCitation?: string;
  withdrawalRates: RateRecord;
  pumpingRates: RateRecord;
  injectionRates: RateRecord;
  wasteWaterFlowVolume: RateRecord;
  riverBasin?: string;
  groundwaterBody?: string;
  waterBody?: string;
  floodArea?: string;
  waterProtectionArea?: string;
  damTargetLevels: DamTargets;
  fluidDischarge: RateRecord;
  rainSupplement: RateRecord;
  irrigationArea?: Quantity;
  phValues?: PhValues;
  injectionLimits: Array<[substance: string, quantity: Quantity]>;
  utmEasting?: number;
  utmNorthing?: number;
}

export interface LegalDepartment {
  description: string;
  abbreviation: LegalDepartmentAbbreviation;
  usageLocations: UsageLocation[];
}

export interface WaterRight {
  no: WaterRightNo;
  holder?: string;
  validUntil?: string;
  status?: string;
  validFrom?: string;
  legalTitle?: string;
  waterAuthority?: string;
  registeringAuthority?: string;
  grantingAuthority?: string;
  initiallyGranted?: string;
  lastChange?: string;
  fileReference?: string;
  externalIdentifier?: string;
  subject?: string;
  address?: string;
  legalDepartments: Partial<Record<LegalDepartmentAbbreviation, LegalDepartment>>;
  annotation?: string;
}
