import { recordUnitLoad } from '../deferred';
import { Scheme } from './Scheme';
import { Spec } from './Spec';

recordUnitLoad('AffineScheme');

// Spec of ring / (equations)
export class AffineScheme extends Scheme {
  constructor(readonly ring: string, readonly equations: readonly string[] = []) {
    super(equations.length ? `Spec(${ring}/(${equations.join(', ')}))` : `Spec(${ring})`);
  }

  ambientSpec(): Spec {
    return Spec.ofRing(this.ring);
  }
}
