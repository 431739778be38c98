import { FieldFormatError, UnknownFieldError } from '../errors';
import { createUsageLocation } from '../waterRight/model';
import { pair, parseLandRecord, parseUnsignedInt, single } from '../waterRight/values';
import type { KeyValuePair } from '../../types/report';
import type {
  CodeAndName,
  LegalDepartmentAbbreviation,
  SingleOrPair,
  UsageLocation,
} from '../../types/waterRight';
import { applyAllowance } from './allowance';
import { firstValue, secondValue, splitCodeAndName } from './sanitize';

const USAGE_LOCATION_HEADER_RE = /^(?<serial>.*) \((?<active>\w+), (?<real>\w+)\)$/;
const DIGITS_RE = /^\d+$/;

interface FieldContext {
  key: string;
  first?: string;
  second?: string;
  department: LegalDepartmentAbbreviation;
}

type FieldHandler = (location: UsageLocation, field: FieldContext) => void;

function arityError(field: FieldContext): UnknownFieldError {
  return new UnknownFieldError('usage location', field.key, [field.first, field.second]);
}

function required(field: FieldContext): string {
  if (field.first === undefined) throw arityError(field);
  return field.first;
}

function integer(field: FieldContext, text: string): number {
  const trimmed = text.trim();
  const value = parseUnsignedInt(trimmed);
  if (value !== null) return value;
  if (DIGITS_RE.test(trimmed)) throw new FieldFormatError(field.key, trimmed, 'is too large to keep exactly');
  throw new FieldFormatError(field.key, text, 'is not a number');
}

function codeAndName(field: FieldContext): CodeAndName | undefined {
  if (field.first === undefined && field.second === undefined) return undefined;
  if (field.first === undefined || field.second === undefined) throw arityError(field);
  return [integer(field, field.first), field.second];
}

function singleOrPair(field: FieldContext): SingleOrPair<number, string> | undefined {
  if (field.first === undefined) {
    if (field.second !== undefined) throw arityError(field);
    return undefined;
  }
  const code = integer(field, field.first.replace(/ /g, ''));
  return field.second === undefined ? single(code) : pair(code, field.second);
}

function utm(field: FieldContext): number | undefined {
  const value = integer(field, required(field));
  return value === 0 ? undefined : value;
}

export function parseUsageLocationHeader(value: string): { serial: string; active: boolean; real: boolean } {
  const match = USAGE_LOCATION_HEADER_RE.exec(value);
  if (!match?.groups) throw new FieldFormatError('Nutzungsort Lfd. Nr.:', value);
  return {
    serial: match.groups.serial,
    active: match.groups.active === 'aktiv',
    real: match.groups.real === 'real',
  };
}

const USAGE_LOCATION_FIELDS: Record<string, FieldHandler> = {
  'Nutzungsort Lfd. Nr.:': (location, field) => {
    const { serial, active, real } = parseUsageLocationHeader(required(field));
    location.serial = serial;
    location.active = active;
    location.real = real;
  },
  'Bezeichnung:': (location, { first }) => {
    location.name = first?.replace(/\n/g, ' ');
  },
  'Rechtszweck:': (location, field) => {
    location.legalPurpose = splitCodeAndName(required(field));
  },
  'East und North:': (location, field) => {
    location.utmEasting = utm(field);
  },
  '(ETRS89/UTM 32N)': (location, field) => {
    location.utmNorthing = utm(field);
  },
  'Top. Karte 1:25.000:': (location, field) => {
    location.mapExcerpt = singleOrPair(field);
  },
  'Gemeindegebiet:': (location, field) => {
    location.municipalArea = codeAndName(field);
  },
  'Gemarkung, Flur:': (location, { first }) => {
    if (first !== undefined) location.landRecord = parseLandRecord(first);
  },
  'Unterhaltungsverband:': (location, field) => {
    location.maintenanceAssociation = codeAndName(field);
  },
  'Flurstück:': (location, { first }) => {
    if (first !== undefined) location.plot = first;
  },
  'EU-Bearbeitungsgebiet:': (location, field) => {
    location.euSurveyArea = codeAndName(field);
  },
  'Gewässer:': (location, { first }) => {
    location.waterBody = first;
  },
  'Einzugsgebietskennzahl:': (location, field) => {
    location.catchmentAreaCode = singleOrPair(field);
  },
  'Verordnungszitat:': (location, { first }) => {
    location.regulationCitation = first;
  },
  'Erlaubniswert:': (location, field) => {
    applyAllowance(required(field), location, field.department);
  },
};

export function isUsageLocationKey(key: string): boolean {
  return Object.prototype.hasOwnProperty.call(USAGE_LOCATION_FIELDS, key);
}

export function parseUsageLocation(pairs: KeyValuePair[], department: LegalDepartmentAbbreviation): UsageLocation {
  const location = createUsageLocation();

  for (const { key, values } of pairs) {
    const field: FieldContext = {
      key,
      first: firstValue(values),
      second: secondValue(values),
      department,
    };
    if (!isUsageLocationKey(key)) throw arityError(field);
    USAGE_LOCATION_FIELDS[key](location, field);
  }

  return location;
}
