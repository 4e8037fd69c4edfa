import { recordUnitLoad } from '../deferred';
import { Morphism } from './Morphism';
import { Scheme } from './Scheme';

recordUnitLoad('Homset');

export class Homset {
  private members: Morphism[] = [];

  constructor(readonly domain: Scheme, readonly codomain: Scheme) {
    if (!(domain instanceof Scheme) || !(codomain instanceof Scheme)) {
      throw new TypeError('Homset endpoints must be schemes');
    }
  }

  morphism(label: string): Morphism {
    const morphism = new Morphism(this.domain, this.codomain, label, this);
    this.members.push(morphism);
    return morphism;
  }

  adopt(morphism: Morphism): void {
    if (!this.members.includes(morphism)) this.members.push(morphism);
  }

  morphisms(): readonly Morphism[] {
    return this.members;
  }

  toString(): string {
    return `Hom(${this.domain}, ${this.codomain})`;
  }
}
