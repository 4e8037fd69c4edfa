import { recordUnitLoad } from '../deferred';
import { AmbientSpace } from './AmbientSpace';
import { Homset } from './Homset';
import { Scheme } from './Scheme';

recordUnitLoad('AlgebraicScheme');

// Subscheme of an ambient space cut out by equations
export class AlgebraicScheme extends Scheme {
  constructor(readonly ambient: AmbientSpace, readonly equations: readonly string[]) {
    super(`V(${equations.join(', ')}) in ${ambient}`);
    if (!(ambient instanceof AmbientSpace)) {
      throw new TypeError('Ambient must be an ambient space');
    }
  }

  embedding(): Homset {
    const homset = new Homset(this, this.ambient);
    homset.morphism('i');
    return homset;
  }
}
