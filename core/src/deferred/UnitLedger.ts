import EventEmitter from 'eventemitter3';
import { EntityTypeName, UnitLoadedEvent } from '../types';

interface LedgerEvents {
  unitLoaded: (event: UnitLoadedEvent) => void;
}

// Records every time an entity unit's module body runs
export class UnitLedger extends EventEmitter<LedgerEvents> {
  private counts = new Map<EntityTypeName, number>();
  private order: EntityTypeName[] = [];

  recordLoad(type: EntityTypeName): void {
    const count = (this.counts.get(type) ?? 0) + 1;
    this.counts.set(type, count);
    if (count === 1) {
      this.order.push(type);
    }
    this.emit('unitLoaded', { type, count });
  }

  loadCount(type: EntityTypeName): number {
    return this.counts.get(type) ?? 0;
  }

  isLoaded(type: EntityTypeName): boolean {
    return this.loadCount(type) > 0;
  }

  // In order of first load
  loadedUnits(): EntityTypeName[] {
    return [...this.order];
  }
}

export const unitLedger = new UnitLedger();

export function recordUnitLoad(type: EntityTypeName): void {
  unitLedger.recordLoad(type);
}
