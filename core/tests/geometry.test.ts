import {
  AffineScheme,
  AlgebraicScheme,
  AmbientSpace,
  Divisor,
  DivisorGroup,
  FanoToricVariety,
  Glue,
  Homset,
  Hypersurface,
  Morphism,
  ProjectiveScheme,
  Scheme,
  Spec,
  ToricDivisor,
  ToricVariety
} from '../src/geometry';

describe('Geometric units', () => {
  describe('Scheme and Spec', () => {
    test('should default the base scheme to Spec(ZZ)', () => {
      const base = new Scheme('X').baseScheme();

      expect(base).toBeInstanceOf(Spec);
      expect(base.toString()).toBe('Spec(ZZ)');
    });

    test('should keep an explicit base scheme', () => {
      const base = new Spec('QQ');
      expect(new Scheme('X', base).baseScheme()).toBe(base);
    });

    test('should treat Spec(ZZ) as its own base', () => {
      const spec = Spec.ofRing('ZZ');
      expect(spec.baseScheme()).toBe(spec);
      expect(new Spec('QQ').baseScheme().toString()).toBe('Spec(ZZ)');
    });

    test('should build a homset between schemes', () => {
      const X = new Scheme('X');
      const Y = new Scheme('Y');
      const hom = X.hom(Y);

      expect(hom).toBeInstanceOf(Homset);
      expect(hom.toString()).toBe('Hom(X, Y)');
    });
  });

  describe('Morphisms and homsets', () => {
    test('should link morphisms and their homset both ways', () => {
      const hom = new Homset(new Scheme('X'), new Scheme('Y'));
      const f = hom.morphism('f');
      const g = hom.morphism('g');

      expect(f.parent()).toBe(hom);
      expect(hom.morphisms()).toEqual([f, g]);
      expect(f.toString()).toBe('f: X -> Y');
    });

    test('should create the parent homset on demand once', () => {
      const f = new Morphism(new Scheme('X'), new Scheme('Y'));
      const parent = f.parent();

      expect(f.parent()).toBe(parent);
      expect(parent.morphisms()).toEqual([f]);
    });

    test('should glue along morphisms with a common domain', () => {
      const U = new Scheme('U');
      const glued = new Glue(new Morphism(U, new Scheme('X')), new Morphism(U, new Scheme('Y')));

      expect(glued.toString()).toBe('X ∪ Y');
      expect(glued.pieces().map(String)).toEqual(['X', 'Y']);
      expect(() => new Glue(new Morphism(U, U), new Morphism(new Scheme('V'), U)))
        .toThrow('Glued morphisms must share a domain');
    });
  });

  describe('Varieties', () => {
    test('should describe affine and projective schemes', () => {
      const affine = new AffineScheme('QQ[x,y]', ['x*y - 1']);

      expect(affine.toString()).toBe('Spec(QQ[x,y]/(x*y - 1))');
      expect(affine.ambientSpec().toString()).toBe('Spec(QQ[x,y])');
      expect(new ProjectiveScheme(2).projectiveDimension).toBe(2);
    });

    test('should check point dimensions', () => {
      const plane = new AmbientSpace(2);

      expect(plane.point(['1', '2']).toString()).toBe('(1 : 2)');
      expect(() => plane.point(['1'])).toThrow(RangeError);
    });

    test('should embed an algebraic scheme in its ambient space', () => {
      const curve = new Hypersurface(new ProjectiveScheme(2), 'x^3 + y^3 + z^3');
      const embedding = curve.embedding();

      expect(curve).toBeInstanceOf(AlgebraicScheme);
      expect(curve.toString()).toBe('V(x^3 + y^3 + z^3) in P^2');
      expect(embedding.morphisms().map(m => m.label)).toEqual(['i']);
    });

    test('should map between toric varieties', () => {
      const X = new ToricVariety([[1, 0], [0, 1]]);
      const Y = new FanoToricVariety([[1, 0], [0, 1], [-1, -1]]);
      const phi = X.morphismTo(Y, [[1, 0], [0, 1]]);

      expect(phi.toString()).toBe('phi: X_Sigma -> X_Delta');
      expect(phi.parent().toString()).toBe('Hom(X_Sigma, X_Delta)');
    });
  });

  describe('Divisors', () => {
    test('should print divisors and their group', () => {
      const X = new Scheme('X');
      const D = new Divisor(X, new Map([['P', 2], ['Q', 1]]));

      expect(D.toString()).toBe('2*P + Q');
      expect(D.parent()).toBeInstanceOf(DivisorGroup);
      expect(D.parent().toString()).toBe('Div(X)');
      expect(D.parent().zero().toString()).toBe('0');
    });

    test('should keep divisors made by a group in that group', () => {
      const group = new DivisorGroup(new Scheme('X'));
      expect(group.divisor(new Map([['P', 1]])).parent()).toBe(group);
    });

    test('should give torus-invariant divisors a group on their variety', () => {
      const X = new ToricVariety([[1, 0], [0, 1], [-1, -1]]);
      const D = X.divisor(0);

      expect(D).toBeInstanceOf(ToricDivisor);
      expect(D.toString()).toBe('D0');
      expect(D.parent().toString()).toBe('Div(X_Sigma)');
      expect(() => X.divisor(3)).toThrow('No ray 3 in a fan with 3 rays');
    });
  });
});
