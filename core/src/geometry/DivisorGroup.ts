import { recordUnitLoad } from '../deferred';
import { Divisor, DivisorTerms } from './Divisor';
import type { Scheme } from './Scheme';

recordUnitLoad('DivisorGroup');

export class DivisorGroup {
  constructor(readonly scheme: Scheme) {}

  divisor(terms: DivisorTerms): Divisor {
    return new Divisor(this.scheme, terms, this);
  }

  zero(): Divisor {
    return this.divisor(new Map());
  }

  toString(): string {
    return `Div(${this.scheme})`;
  }
}
