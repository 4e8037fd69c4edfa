import { declareDeferred, methodScope, recordUnitLoad, resolve } from '../deferred';
import type { Homset } from './Homset';
import { Scheme } from './Scheme';

recordUnitLoad('Morphism');

export class Morphism {
  constructor(
    readonly domain: Scheme,
    readonly codomain: Scheme,
    readonly label: string = 'f',
    private homset?: Homset
  ) {
    if (!(domain instanceof Scheme) || !(codomain instanceof Scheme)) {
      throw new TypeError('Morphism endpoints must be schemes');
    }
  }

  // A morphism knows its homset and the homset enumerates its morphisms;
  // the cycle exists at run time only
  parent(): Homset {
    if (this.homset) return this.homset;

    const homsetUnit = declareDeferred(
      'Morphism',
      'Homset',
      methodScope('Morphism.parent'),
      (): typeof import('./Homset') => require('./Homset')
    );
    const { Homset } = resolve(homsetUnit);
    this.homset = new Homset(this.domain, this.codomain);
    this.homset.adopt(this);
    return this.homset;
  }

  toString(): string {
    return `${this.label}: ${this.domain} -> ${this.codomain}`;
  }
}
