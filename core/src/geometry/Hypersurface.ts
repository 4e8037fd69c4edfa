import { recordUnitLoad } from '../deferred';
import { AlgebraicScheme } from './AlgebraicScheme';
import type { AmbientSpace } from './AmbientSpace';

recordUnitLoad('Hypersurface');

export class Hypersurface extends AlgebraicScheme {
  constructor(ambient: AmbientSpace, readonly equation: string) {
    super(ambient, [equation]);
  }
}
