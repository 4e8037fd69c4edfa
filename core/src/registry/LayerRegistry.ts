import { ILayerRegistry } from '../interfaces/LayerRegistry';
import { EntityTypeName, LayerEntry, LayerNumber } from '../types';
import { UnknownTypeError } from '../utils/errors';
import { LAYER_TABLE, LayerRow } from './layer-table';

export class LayerRegistry implements ILayerRegistry {
  private readonly layers = new Map<string, LayerNumber>()
  private readonly entries: readonly LayerEntry[]
  private readonly ordered: readonly EntityTypeName[]

  constructor(table: readonly LayerRow[]) {
    const rows = [...table].sort((a, b) => a.layer - b.layer)
    const ordered: EntityTypeName[] = []

    for (const row of rows) {
      for (const type of row.types) {
        const existing = this.layers.get(type)
        if (existing !== undefined) {
          throw new Error(`${type} is listed in layers ${existing} and ${row.layer}`)
        }
        this.layers.set(type, row.layer)
        ordered.push(type)
      }
    }

    // Rows sharing a layer number are merged
    const merged = new Map<LayerNumber, Set<EntityTypeName>>()
    for (const row of rows) {
      const types = merged.get(row.layer) ?? new Set<EntityTypeName>()
      row.types.forEach(t => types.add(t))
      merged.set(row.layer, types)
    }

    this.entries = Object.freeze(
      [...merged.entries()].map(([layer, types]) => Object.freeze({ layer, types }))
    )
    this.ordered = Object.freeze(ordered)
  }

  layerOf(name: string): LayerNumber {
    const layer = this.layers.get(name)
    if (layer === undefined) {
      throw new UnknownTypeError(name)
    }
    return layer
  }

  has(name: string): name is EntityTypeName {
    return this.layers.has(name)
  }

  allLayers(): readonly LayerEntry[] {
    return this.entries
  }

  typesIn(layer: LayerNumber): readonly EntityTypeName[] {
    return this.ordered.filter(t => this.layers.get(t) === layer)
  }

  entityTypes(): readonly EntityTypeName[] {
    return this.ordered
  }
}

// Built once when the module loads; read-only afterwards
export const layerRegistry: ILayerRegistry = new LayerRegistry(LAYER_TABLE)

export function layerOf(name: string): LayerNumber {
  return layerRegistry.layerOf(name)
}

export function allLayers(): readonly LayerEntry[] {
  return layerRegistry.allLayers()
}
