import { FieldFormatError } from '../errors';
import { insertRate, rateOrFallback } from '../waterRight/rate';
import { parseStrictFloat, quantity } from '../waterRight/values';
import type {
  DamTargets,
  LegalDepartmentAbbreviation,
  Quantity,
  UsageLocation,
} from '../../types/waterRight';

const ALLOWANCE_KEY = 'Erlaubniswert:';

type RateField =
  | 'withdrawalRates'
  | 'pumpingRates'
  | 'injectionRates'
  | 'wasteWaterFlowVolume'
  | 'fluidDischarge'
  | 'rainSupplement';

type AllowanceTarget =
  | { kind: 'rate'; field: RateField }
  | { kind: 'damTarget'; level: keyof DamTargets }
  | { kind: 'irrigationArea' };

const WASTE_WATER: AllowanceTarget = { kind: 'rate', field: 'wasteWaterFlowVolume' };

const ALLOWANCE_KINDS: Record<string, AllowanceTarget> = {
  Entnahmemenge: { kind: 'rate', field: 'withdrawalRates' },
  'Förderleistung': { kind: 'rate', field: 'pumpingRates' },
  Einleitungsmenge: { kind: 'rate', field: 'injectionRates' },
  'Abwasservolumenstrom, Sekunde': WASTE_WATER,
  'Abwasservolumenstrom, RW, Sekunde': WASTE_WATER,
  'Abwasservolumenstrom, Std.': WASTE_WATER,
  'Abwasservolumenstrom, Tag': WASTE_WATER,
  'Abwasservolumenstrom, Jahr': WASTE_WATER,
  'Abwasservolumenstrom, RW, Jahr': WASTE_WATER,
  Zusatzregen: { kind: 'rate', field: 'rainSupplement' },
  Ableitungsmenge: { kind: 'rate', field: 'fluidDischarge' },
  'Stauziel, bezogen auf NN': { kind: 'damTarget', level: 'default' },
  'Stauziel (Dauerstau), bezogen auf NN': { kind: 'damTarget', level: 'steady' },
  'Stauziel (Höchststau), bezogen auf NN': { kind: 'damTarget', level: 'max' },
  'Beregnungsfläche': { kind: 'irrigationArea' },
};

const INJECTION_LIMIT_DEPARTMENTS = new Set<LegalDepartmentAbbreviation>(['B', 'C', 'F']);

export interface AllowanceParts {
  kind: string;
  value: string;
  unit: string;
}

/** `"Entnahmemenge 12 m³/a"` → kind, value and unit, split from the right. */
export function splitAllowance(text: string): AllowanceParts {
  const unitAt = text.lastIndexOf(' ');
  if (unitAt <= 0) throw new FieldFormatError(ALLOWANCE_KEY, text, 'has no value');
  const valueAt = text.lastIndexOf(' ', unitAt - 1);
  if (valueAt < 0) throw new FieldFormatError(ALLOWANCE_KEY, text, 'has no kind');

  return {
    kind: text.slice(0, valueAt).trim().replace(/:$/, ''),
    value: text.slice(valueAt + 1, unitAt),
    unit: text.slice(unitAt + 1),
  };
}

function toQuantity({ value, unit }: AllowanceParts, text: string): Quantity {
  const amount = parseStrictFloat(value);
  if (amount === null) throw new FieldFormatError(ALLOWANCE_KEY, text, 'has a non-numeric quantity');
  return quantity(amount, unit);
}

export function allowanceTarget(kind: string): AllowanceTarget | null {
  return Object.prototype.hasOwnProperty.call(ALLOWANCE_KINDS, kind) ? ALLOWANCE_KINDS[kind] : null;
}

/**
 * Routes one `Erlaubniswert:` line into the usage location. Rates that do not
 * follow the rate grammar are kept as their raw text.
 */
export function applyAllowance(
  text: string,
  location: UsageLocation,
  department: LegalDepartmentAbbreviation
): void {
  const parts = splitAllowance(text);
  const target = allowanceTarget(parts.kind);

  if (!target) {
    if (!INJECTION_LIMIT_DEPARTMENTS.has(department)) {
      throw new FieldFormatError(ALLOWANCE_KEY, text, `has unknown kind '${parts.kind}'`);
    }
    location.injectionLimits.push([parts.kind, toQuantity(parts, text)]);
    return;
  }

  switch (target.kind) {
    case 'rate':
      insertRate(location[target.field], rateOrFallback(`${parts.value} ${parts.unit}`));
      break;
    case 'damTarget':
      location.damTargetLevels[target.level] = toQuantity(parts, text);
      break;
    case 'irrigationArea':
      location.irrigationArea = toQuantity(parts, text);
      break;
  }
}
