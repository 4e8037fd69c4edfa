import { EntityTypeName, ResolutionScope } from '../types';
import { DeferredReference } from '../deferred/DeferredReference';

export interface IDeferredResolver {
  declareDeferred<T>(
    from: EntityTypeName,
    to: EntityTypeName,
    scope: ResolutionScope,
    load: () => T
  ): DeferredReference<T>;
  resolve<T>(ref: DeferredReference<T>): T;
}
