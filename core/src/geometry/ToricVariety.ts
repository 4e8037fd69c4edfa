import { declareDeferred, methodScope, recordUnitLoad, resolve } from '../deferred';
import { AmbientSpace } from './AmbientSpace';
import type { ToricDivisor } from './ToricDivisor';
import { ToricMorphism } from './ToricMorphism';

recordUnitLoad('ToricVariety');

export class ToricVariety extends AmbientSpace {
  constructor(readonly rays: readonly (readonly number[])[], label: string = 'X_Sigma') {
    super(rays.length, label);
  }

  morphismTo(target: ToricVariety, latticeMap: readonly (readonly number[])[]): ToricMorphism {
    return new ToricMorphism(this, target, latticeMap);
  }

  // Torus-invariant divisor of the i-th ray; ToricDivisor loads last
  divisor(i: number): ToricDivisor {
    if (i < 0 || i >= this.rays.length) {
      throw new RangeError(`No ray ${i} in a fan with ${this.rays.length} rays`);
    }
    const divisorUnit = declareDeferred(
      'ToricVariety',
      'ToricDivisor',
      methodScope('ToricVariety.divisor'),
      (): typeof import('./ToricDivisor') => require('./ToricDivisor')
    );
    const { ToricDivisor } = resolve(divisorUnit);
    return new ToricDivisor(this, i);
  }
}
