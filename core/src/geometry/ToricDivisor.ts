import { recordUnitLoad } from '../deferred';
import { Divisor } from './Divisor';
import { DivisorGroup } from './DivisorGroup';
import { ToricVariety } from './ToricVariety';

recordUnitLoad('ToricDivisor');

export class ToricDivisor extends Divisor {
  constructor(readonly variety: ToricVariety, readonly ray: number) {
    super(variety, new Map([[`D${ray}`, 1]]));
    if (!(variety instanceof ToricVariety)) {
      throw new TypeError('A toric divisor lives on a toric variety');
    }
  }

  parent(): DivisorGroup {
    if (!this.group) {
      this.group = new DivisorGroup(this.variety);
    }
    return this.group;
  }
}
