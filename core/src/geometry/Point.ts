import { recordUnitLoad } from '../deferred';
import type { Scheme } from './Scheme';

recordUnitLoad('Point');

// Same layer as Scheme: the owner is held by value, never imported
export class Point {
  constructor(readonly coordinates: readonly string[], readonly owner?: Scheme) {}

  toString(): string {
    return `(${this.coordinates.join(' : ')})`;
  }
}
