import { LEGAL_DEPARTMENT_ABBREVIATIONS } from '../../types/waterRight';
import type {
  LegalDepartment,
  LegalDepartmentAbbreviation,
  UsageLocation,
  WaterRight,
  WaterRightNo,
} from '../../types/waterRight';

export function createWaterRight(no: WaterRightNo): WaterRight {
  return { no, legalDepartments: {} };
}

export function createUsageLocation(): UsageLocation {
  return {
    withdrawalRates: [],
    pumpingRates: [],
    injectionRates: [],
    wasteWaterFlowVolume: [],
    damTargetLevels: {},
    fluidDischarge: [],
    rainSupplement: [],
    injectionLimits: [],
  };
}

export function createLegalDepartment(
  abbreviation: LegalDepartmentAbbreviation,
  description: string
): LegalDepartment {
  return { abbreviation, description, usageLocations: [] };
}

export function isLegalDepartmentAbbreviation(value: string): value is LegalDepartmentAbbreviation {
  return LEGAL_DEPARTMENT_ABBREVIATIONS.some((abbreviation) => abbreviation === value);
}

/** Departments in abbreviation order. */
export function legalDepartmentsOf(waterRight: WaterRight): LegalDepartment[] {
  const departments: LegalDepartment[] = [];
  for (const abbreviation of LEGAL_DEPARTMENT_ABBREVIATIONS) {
    const department = waterRight.legalDepartments[abbreviation];
    if (department) departments.push(department);
  }
  return departments;
}

export function usageLocationsOf(waterRight: WaterRight): UsageLocation[] {
  return legalDepartmentsOf(waterRight).flatMap((department) => department.usageLocations);
}
