import { declareDeferred, methodScope, recordUnitLoad, resolve } from '../deferred';
import type { Homset } from './Homset';

recordUnitLoad('Scheme');

export class Scheme {
  constructor(readonly label: string, protected base?: Scheme) {}

  // Spec lives on layer 2, so the default base Spec(ZZ) is bound at call time
  baseScheme(): Scheme {
    if (this.base) return this.base;

    const specUnit = declareDeferred(
      'Scheme',
      'Spec',
      methodScope('Scheme.baseScheme'),
      (): typeof import('./Spec') => require('./Spec')
    );
    const { Spec } = resolve(specUnit);
    return Spec.ofRing('ZZ');
  }

  hom(target: Scheme): Homset {
    const homsetUnit = declareDeferred(
      'Scheme',
      'Homset',
      methodScope('Scheme.hom'),
      (): typeof import('./Homset') => require('./Homset')
    );
    const { Homset } = resolve(homsetUnit);
    return new Homset(this, target);
  }

  toString(): string {
    return this.label;
  }
}
