import { recordUnitLoad } from '../deferred';
import { ToricVariety } from './ToricVariety';

recordUnitLoad('FanoToricVariety');

export class FanoToricVariety extends ToricVariety {
  constructor(rays: readonly (readonly number[])[]) {
    super(rays, 'X_Delta');
  }
}
