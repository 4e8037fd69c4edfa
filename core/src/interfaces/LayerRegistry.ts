import { EntityTypeName, LayerEntry, LayerNumber } from '../types';

export interface ILayerRegistry {
  layerOf(name: string): LayerNumber;
  allLayers(): readonly LayerEntry[];
  has(name: string): name is EntityTypeName;
  typesIn(layer: LayerNumber): readonly EntityTypeName[];
  entityTypes(): readonly EntityTypeName[];
}
