import { DeclaredReference, DeferralAdvice, EntityTypeGraph, ValidationReport } from '../types';

export interface IDependencyValidator {
  validate(graph: EntityTypeGraph): ValidationReport;
  assertValid(graph: EntityTypeGraph): void;
  buildEagerGraph(declared: readonly DeclaredReference[]): EntityTypeGraph;
  auditDeferrals(declared: readonly DeclaredReference[]): DeferralAdvice[];
}
