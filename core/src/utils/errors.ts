import { ErrorCode, ILayeringError, LayerViolation, ScopeKind, ValidationReport } from '../types';

export class LayeringError extends Error implements ILayeringError {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class UnknownTypeError extends LayeringError {
  constructor(readonly typeName: string) {
    super(ErrorCode.UnknownType, `Unknown entity type: ${typeName}`, { typeName });
  }
}

export class LayerViolationError extends LayeringError {
  constructor(readonly report: ValidationReport) {
    super(
      ErrorCode.LayerViolation,
      `${report.length} layering violation${report.length === 1 ? '' : 's'} found`,
      { violations: report.map((v: LayerViolation) => ({ ...v })) }
    );
  }
}

export class InvalidScopeError extends LayeringError {
  constructor(readonly from: string, readonly to: string, readonly scope: ScopeKind) {
    super(
      ErrorCode.InvalidScope,
      `Deferred reference ${from} -> ${to} cannot be declared at ${scope} scope`,
      { from, to, scope }
    );
  }
}

export class ReflexiveLoadError extends LayeringError {
  constructor(readonly from: string, readonly to: string) {
    super(
      ErrorCode.ReflexiveLoad,
      `Resolving ${from} -> ${to} loaded the unit of ${from} again`,
      { from, to }
    );
  }
}
