import { z } from 'zod';
import { TableRowError, issueDetails } from '../errors';
import { sanitize } from '../parse/sanitize';
import type { WaterRightNo } from '../../types/waterRight';

const idCell = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'expected a number').transform(Number)])
  .pipe(z.number().int().nonnegative());

const textCell = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => sanitize(value === null || value === undefined ? undefined : String(value)));

const dateCell = z
  .union([z.string(), z.date()])
  .nullish()
  .transform((value) => (value instanceof Date ? value.toISOString().slice(0, 10) : sanitize(value)));

const utmCell = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value, ctx) => {
    const text = sanitize(value === null || value === undefined ? undefined : String(value));
    if (text === undefined) return undefined;
    const coordinate = Number(text.trim());
    if (!Number.isSafeInteger(coordinate) || coordinate < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a non-negative integer' });
      return z.NEVER;
    }
    return coordinate === 0 ? undefined : coordinate;
  });

export const enrichmentRowSchema = z
  .object({
    'Wasserrecht Nr.': idCell,
    Rechtsinhaber: textCell,
    'Gültig Bis': dateCell,
    Zustand: textCell,
    'Gültig Ab': dateCell,
    Rechtsabteilungen: textCell,
    Rechtstitel: textCell,
    Wasserbehoerde: textCell,
    'Erteilende Behoerde': textCell,
    Aenderungsdatum: dateCell,
    Aktenzeichen: textCell,
    'Externe Kennung': textCell,
    Betreff: textCell,
    Adresse: textCell,
    'Nutzungsort Nr.': idCell,
    Nutzungsort: textCell,
    Rechtsabteilung: textCell,
    Rechtszweck: textCell,
    Landkreis: textCell,
    Flussgebiet: textCell,
    'Grundwasserkörper': textCell,
    'Überschwemmungsgebiet': textCell,
    Wasserschutzgebiet: textCell,
    'UTM-Rechtswert': utmCell,
    'UTM-Hochwert': utmCell,
  })
  .transform((row) => ({
    no: row['Wasserrecht Nr.'],
    rightsHolder: row.Rechtsinhaber,
    validUntil: row['Gültig Bis'],
    status: row.Zustand,
    validFrom: row['Gültig Ab'],
    legalDepartments: row.Rechtsabteilungen,
    legalTitle: row.Rechtstitel,
    waterAuthority: row.Wasserbehoerde,
    grantingAuthority: row['Erteilende Behoerde'],
    dateOfChange: row.Aenderungsdatum,
    fileReference: row.Aktenzeichen,
    externalIdentifier: row['Externe Kennung'],
    subject: row.Betreff,
    address: row.Adresse,
    usageLocationNo: row['Nutzungsort Nr.'],
    usageLocation: row.Nutzungsort,
    legalDepartment: row.Rechtsabteilung,
    legalPurpose: row.Rechtszweck,
    county: row.Landkreis,
    riverBasin: row.Flussgebiet,
    groundwaterBody: row['Grundwasserkörper'],
    floodArea: row['Überschwemmungsgebiet'],
    waterProtectionArea: row.Wasserschutzgebiet,
    utmEasting: row['UTM-Rechtswert'],
    utmNorthing: row['UTM-Hochwert'],
  }));

export type EnrichmentRowInput = z.input<typeof enrichmentRowSchema>;
export type EnrichmentRow = Readonly<z.output<typeof enrichmentRowSchema>>;

/** Spreadsheet rows keyed by water right. Read-only once built. */
export class EnrichmentTable {
  private readonly byWaterRight: ReadonlyMap<WaterRightNo, readonly EnrichmentRow[]>;

  private constructor(readonly rows: readonly EnrichmentRow[]) {
    const byWaterRight = new Map<WaterRightNo, EnrichmentRow[]>();
    for (const row of rows) {
      const list = byWaterRight.get(row.no);
      if (list) list.push(row);
      else byWaterRight.set(row.no, [row]);
    }
    this.byWaterRight = byWaterRight;
  }

  static empty(): EnrichmentTable {
    return new EnrichmentTable([]);
  }

  /** Validates rows as read from the spreadsheet, keyed by the German column headers. */
  static fromRows(rows: readonly unknown[]): EnrichmentTable {
    const parsed: EnrichmentRow[] = [];
    rows.forEach((raw, index) => {
      const result = enrichmentRowSchema.safeParse(raw);
      if (!result.success) throw new TableRowError(index, issueDetails(result.error));
      parsed.push(Object.freeze(result.data));
    });
    return new EnrichmentTable(Object.freeze(parsed));
  }

  rowsFor(no: WaterRightNo): readonly EnrichmentRow[] {
    return this.byWaterRight.get(no) ?? [];
  }

  get size(): number {
    return this.rows.length;
  }
}
