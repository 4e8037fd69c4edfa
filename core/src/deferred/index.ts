import { loadSettings } from '../config/settings';
import { EntityTypeName, ResolutionScope } from '../types';
import { CallScope, DeferredReference } from './DeferredReference';
import { DeferredResolver } from './DeferredResolver';

export { DeferredReference, CallScope } from './DeferredReference';
export { DeferredResolver, DeferredResolverOptions } from './DeferredResolver';
export { UnitLedger, unitLedger, recordUnitLoad } from './UnitLedger';

export const MODULE_SCOPE: ResolutionScope = { kind: 'module' };

export const methodScope = (site: string): CallScope => ({ kind: 'method', site });

export const callScope = (site: string): CallScope => ({ kind: 'function', site });

export const defaultResolver = new DeferredResolver({ settings: loadSettings() });

export function declareDeferred<T>(
  from: EntityTypeName,
  to: EntityTypeName,
  scope: ResolutionScope,
  load: () => T
): DeferredReference<T> {
  return defaultResolver.declareDeferred(from, to, scope, load);
}

export function resolve<T>(ref: DeferredReference<T>): T {
  return defaultResolver.resolve(ref);
}
