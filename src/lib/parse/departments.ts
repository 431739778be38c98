import { FieldFormatError, StructuralError } from '../errors';
import { createLegalDepartment, isLegalDepartmentAbbreviation } from '../waterRight/model';
import type { DepartmentGroup } from '../../types/report';
import type { LegalDepartmentAbbreviation, WaterRight } from '../../types/waterRight';
import { parseUsageLocation } from './usageLocation';

// "A Entnahme von Wasser" or "A - Entnahme von Wasser"
const DEPARTMENT_LABEL_RE = /^(\S+)(?:\s+[-–])?(?:\s+([\s\S]+))?$/;

export function parseDepartmentLabel(label: string): {
  abbreviation: LegalDepartmentAbbreviation;
  description: string;
} {
  const trimmed = label.trim();
  if (trimmed.length === 0) throw new StructuralError('department is missing abbreviation');

  const match = DEPARTMENT_LABEL_RE.exec(trimmed);
  const abbreviation = match ? match[1] : trimmed;
  if (!isLegalDepartmentAbbreviation(abbreviation)) {
    throw new FieldFormatError('Abteilung:', label, `has unknown abbreviation '${abbreviation}'`);
  }

  const description = match?.[2];
  if (description === undefined) {
    throw new StructuralError(`department ${abbreviation} is missing description`);
  }

  return { abbreviation, description };
}

export function parseDepartments(groups: DepartmentGroup[], waterRight: WaterRight): void {
  for (const group of groups) {
    const { abbreviation, description } = parseDepartmentLabel(group.label);
    const department = createLegalDepartment(abbreviation, description);
    for (const pairs of group.usageLocations) {
      department.usageLocations.push(parseUsageLocation(pairs, abbreviation));
    }
    waterRight.legalDepartments[abbreviation] = department;
  }
}
