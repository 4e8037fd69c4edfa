// Entity type names of the geometric family, in canonical table order
export const ENTITY_TYPE_NAMES = [
  'Scheme',
  'Point',
  'Spec',
  'AmbientSpace',
  'Morphism',
  'ToricMorphism',
  'Glue',
  'Homset',
  'AffineScheme',
  'ProjectiveScheme',
  'ToricVariety',
  'AlgebraicScheme',
  'FanoToricVariety',
  'Hypersurface',
  'Divisor',
  'DivisorGroup',
  'ToricDivisor'
] as const;

export type EntityTypeName = (typeof ENTITY_TYPE_NAMES)[number];

// 1 loads first, 10 loads last
export type LayerNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10;

export interface LayerEntry {
  layer: LayerNumber;
  types: ReadonlySet<EntityTypeName>;
}

export interface EntityType {
  name: EntityTypeName;
  layer: LayerNumber;
  eagerReferences: readonly EntityTypeName[];
}

// Eager references only; deferred ones are not load-time dependencies
export type EntityTypeGraph = readonly EntityType[];

export type ReferenceKind = 'eager' | 'deferred';

export interface DeclaredReference {
  from: EntityTypeName;
  to: EntityTypeName;
  kind: ReferenceKind;
  site?: string; // e.g. 'Scheme.baseScheme'
}

// Validation types
export interface LayerViolation {
  fromType: EntityTypeName;
  toType: EntityTypeName;
  fromLayer: LayerNumber;
  toLayer: LayerNumber;
}

export type ValidationReport = readonly LayerViolation[];

export type DeferralAdviceKind = 'could-be-eager' | 'missing-site';

export interface DeferralAdvice {
  kind: DeferralAdviceKind;
  reference: DeclaredReference;
  message: string;
}

// Deferred resolution types
export type ResolutionScope =
  | { kind: 'module' }
  | { kind: 'function'; site: string }
  | { kind: 'method'; site: string };

export type ScopeKind = ResolutionScope['kind'];

export interface ResolvedEvent {
  from: EntityTypeName;
  to: EntityTypeName;
  site: string;
  cached: boolean;
}

export interface UnitLoadedEvent {
  type: EntityTypeName;
  count: number;
}

// Error types
export enum ErrorCode {
  UnknownType = 'UNKNOWN_TYPE',
  LayerViolation = 'LAYER_VIOLATION',
  InvalidScope = 'INVALID_SCOPE',
  ReflexiveLoad = 'REFLEXIVE_LOAD'
}

export interface ILayeringError extends Error {
  code: ErrorCode;
  details?: Record<string, unknown>;
}
