import { FieldFormatError, UnknownFieldError } from '../errors';
import type { KeyValuePair } from '../../types/report';
import type { WaterRight } from '../../types/waterRight';
import { firstValue } from './sanitize';

type RootHandler = (waterRight: WaterRight, value: string | undefined, pair: KeyValuePair) => void;

const KENNZIFFER_RE = /^([\s\S]*)\s(\S*)$/;

/** `"123456 (aktiv)"` → external identifier `123456`, status `aktiv`. */
export function parseKennziffer(value: string): { externalIdentifier?: string; status: string } {
  const trimmed = value.trim();
  const match = KENNZIFFER_RE.exec(trimmed);
  const statusToken = match ? match[2] : trimmed;
  if (statusToken.length < 2) {
    throw new FieldFormatError('Kennziffer', value, 'has no enclosed status');
  }

  const status = statusToken.slice(1, -1);
  return match ? { externalIdentifier: match[1], status } : { status };
}

const ignore: RootHandler = () => undefined;

const ROOT_FIELDS: Record<string, RootHandler> = {
  'Wasserbuchbehörde': (wr, v) => {
    wr.waterAuthority = v;
  },
  Kennziffer: (wr, v, pair) => {
    if (v === undefined) throw new UnknownFieldError('root', pair.key, pair.values);
    const { externalIdentifier, status } = parseKennziffer(v);
    wr.status = status;
    wr.externalIdentifier = externalIdentifier;
  },
  'eingetragen durch:': (wr, v) => {
    wr.registeringAuthority = v;
  },
  'erteilt durch:': (wr, v) => {
    wr.grantingAuthority = v;
  },
  'erteilt am:': (wr, v) => {
    wr.validFrom = v;
  },
  'erstmalig erteilt am:': (wr, v) => {
    wr.initiallyGranted = v;
  },
  'erstmalig ertellt am:': (wr, v) => {
    wr.initiallyGranted = v;
  },
  'Aktenzeichen:': (wr, v) => {
    wr.fileReference = v;
  },
  'Das Recht ist befristet bis': (wr, v) => {
    wr.validUntil = v;
  },
  'Betreff:': (wr, v) => {
    wr.subject = v;
  },
  // layout labels
  'erteilt durch /': ignore,
  abweichend: ignore,
  'und betrifft Rechtsabteilungen': ignore,
};

export function isRootKey(key: string): boolean {
  return Object.prototype.hasOwnProperty.call(ROOT_FIELDS, key);
}

export function parseRoot(pairs: KeyValuePair[], waterRight: WaterRight): void {
  for (const pair of pairs) {
    if (!isRootKey(pair.key)) throw new UnknownFieldError('root', pair.key, pair.values);
    ROOT_FIELDS[pair.key](waterRight, firstValue(pair.values), pair);
  }
}
