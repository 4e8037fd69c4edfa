import { declareDeferred, methodScope, recordUnitLoad, resolve } from '../deferred';
import type { DivisorGroup } from './DivisorGroup';
import { Scheme } from './Scheme';

recordUnitLoad('Divisor');

export type DivisorTerms = ReadonlyMap<string, number>;

export class Divisor {
  constructor(readonly scheme: Scheme, readonly terms: DivisorTerms, protected group?: DivisorGroup) {
    if (!(scheme instanceof Scheme)) {
      throw new TypeError('A divisor lives on a scheme');
    }
  }

  parent(): DivisorGroup {
    if (this.group) return this.group;

    const groupUnit = declareDeferred(
      'Divisor',
      'DivisorGroup',
      methodScope('Divisor.parent'),
      (): typeof import('./DivisorGroup') => require('./DivisorGroup')
    );
    const { DivisorGroup } = resolve(groupUnit);
    this.group = new DivisorGroup(this.scheme);
    return this.group;
  }

  toString(): string {
    const parts = [...this.terms].map(([prime, n]) => (n === 1 ? prime : `${n}*${prime}`));
    return parts.length ? parts.join(' + ') : '0';
  }
}
