import { recordUnitLoad } from '../deferred';
import { AmbientSpace } from './AmbientSpace';

recordUnitLoad('ProjectiveScheme');

export class ProjectiveScheme extends AmbientSpace {
  constructor(dimension: number) {
    super(dimension + 1, `P^${dimension}`);
  }

  get projectiveDimension(): number {
    return this.dimension - 1;
  }
}
