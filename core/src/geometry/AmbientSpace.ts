import { recordUnitLoad } from '../deferred';
import { Point } from './Point';
import { Scheme } from './Scheme';

recordUnitLoad('AmbientSpace');

export class AmbientSpace extends Scheme {
  constructor(readonly dimension: number, label: string = `A^${dimension}`, base?: Scheme) {
    super(label, base);
  }

  point(coordinates: readonly string[]): Point {
    if (coordinates.length !== this.dimension) {
      throw new RangeError(`Expected ${this.dimension} coordinates, got ${coordinates.length}`);
    }
    return new Point(coordinates, this);
  }
}
