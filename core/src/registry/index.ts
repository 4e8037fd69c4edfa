export { LAYER_TABLE, LayerRow } from './layer-table';
export { LayerRegistry, layerRegistry, layerOf, allLayers } from './LayerRegistry';
