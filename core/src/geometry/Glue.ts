import { recordUnitLoad } from '../deferred';
import { Morphism } from './Morphism';
import { Scheme } from './Scheme';

recordUnitLoad('Glue');

// Two schemes glued along f: U -> X and g: U -> Y
export class Glue extends Scheme {
  readonly f: Morphism;
  readonly g: Morphism;

  constructor(f: Morphism, g: Morphism) {
    super(Glue.describe(f, g));
    this.f = f;
    this.g = g;
  }

  private static describe(f: Morphism, g: Morphism): string {
    if (!(f instanceof Morphism) || !(g instanceof Morphism)) {
      throw new TypeError('Glue needs two morphisms');
    }
    if (f.domain !== g.domain) {
      throw new Error('Glued morphisms must share a domain');
    }
    return `${f.codomain} ∪ ${g.codomain}`;
  }

  pieces(): Scheme[] {
    return [this.f.codomain, this.g.codomain];
  }
}
