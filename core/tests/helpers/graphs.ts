// tests/helpers/graphs.ts
import { layerOf } from '../../src/registry/LayerRegistry';
import { DeclaredReference, EntityType, EntityTypeName } from '../../src/types';

export const entity = (name: EntityTypeName, eagerReferences: EntityTypeName[] = []): EntityType => ({
  name,
  layer: layerOf(name),
  eagerReferences
});

export const eager = (from: EntityTypeName, to: EntityTypeName): DeclaredReference => ({
  from,
  to,
  kind: 'eager'
});

export const deferred = (from: EntityTypeName, to: EntityTypeName, site?: string): DeclaredReference => ({
  from,
  to,
  kind: 'deferred',
  site
});
