import { recordUnitLoad } from '../deferred';
import { Scheme } from './Scheme';

recordUnitLoad('Spec');

export class Spec extends Scheme {
  constructor(readonly ring: string, base?: Scheme) {
    super(`Spec(${ring})`, base);
  }

  static ofRing(ring: string): Spec {
    return new Spec(ring);
  }

  baseScheme(): Scheme {
    if (!this.base && this.ring === 'ZZ') return this;
    return super.baseScheme();
  }
}
