export { DECLARED_REFERENCES } from './references';

export { Scheme } from './Scheme';
export { Point } from './Point';
export { Spec } from './Spec';
export { AmbientSpace } from './AmbientSpace';
export { Morphism } from './Morphism';
export { ToricMorphism } from './ToricMorphism';
export { Glue } from './Glue';
export { Homset } from './Homset';
export { AffineScheme } from './AffineScheme';
export { ProjectiveScheme } from './ProjectiveScheme';
export { ToricVariety } from './ToricVariety';
export { AlgebraicScheme } from './AlgebraicScheme';
export { FanoToricVariety } from './FanoToricVariety';
export { Hypersurface } from './Hypersurface';
export { Divisor, DivisorTerms } from './Divisor';
export { DivisorGroup } from './DivisorGroup';
export { ToricDivisor } from './ToricDivisor';
