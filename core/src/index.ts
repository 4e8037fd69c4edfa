// Types
export * from './types';

// Layer registry
export { LAYER_TABLE, LayerRow, LayerRegistry, layerRegistry, layerOf, allLayers } from './registry';

// Validation
export { DependencyValidator, validate, formatReport, formatViolation } from './validation';

// Deferred references
export {
  DeferredReference,
  DeferredResolver,
  DeferredResolverOptions,
  CallScope,
  UnitLedger,
  unitLedger,
  recordUnitLoad,
  MODULE_SCOPE,
  methodScope,
  callScope,
  defaultResolver,
  declareDeferred,
  resolve
} from './deferred';

// Declared references of the geometric units; the units themselves load from './geometry'
export { DECLARED_REFERENCES } from './geometry/references';

// Contracts
export { ILayerRegistry } from './interfaces/LayerRegistry';
export { IDependencyValidator } from './interfaces/DependencyValidator';
export { IDeferredResolver } from './interfaces/DeferredResolver';

// Utilities
export { DEFAULT_SETTINGS, LayeringSettings, loadSettings } from './config/settings';
export { Logger } from './utils/logger';
export { ErrorHandler } from './utils/error-handler';
export {
  LayeringError,
  UnknownTypeError,
  LayerViolationError,
  InvalidScopeError,
  ReflexiveLoadError
} from './utils/errors';
