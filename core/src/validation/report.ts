import { LayerViolation, ValidationReport } from '../types';

export function formatViolation(violation: LayerViolation): string {
  return `${violation.fromType} (layer ${violation.fromLayer}) -> ${violation.toType} (layer ${violation.toLayer})`;
}

// One line per violation, in report order
export function formatReport(report: ValidationReport): string[] {
  return report.map(formatViolation);
}
