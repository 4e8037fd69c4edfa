import { EntityTypeGraph, ValidationReport } from '../types';
import { DependencyValidator } from './DependencyValidator';

export { DependencyValidator } from './DependencyValidator';
export { formatReport, formatViolation } from './report';

const defaultValidator = new DependencyValidator();

export function validate(graph: EntityTypeGraph): ValidationReport {
  return defaultValidator.validate(graph);
}
