import { recordUnitLoad } from '../deferred';
import { Morphism } from './Morphism';
import type { Scheme } from './Scheme';

recordUnitLoad('ToricMorphism');

export class ToricMorphism extends Morphism {
  constructor(domain: Scheme, codomain: Scheme, readonly latticeMap: readonly (readonly number[])[]) {
    super(domain, codomain, 'phi');
  }
}
