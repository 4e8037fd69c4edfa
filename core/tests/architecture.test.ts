import fs from 'fs';
import path from 'path';
import { DECLARED_REFERENCES } from '../src/geometry/references';
import { layerOf, layerRegistry } from '../src/registry/LayerRegistry';
import { DependencyValidator } from '../src/validation/DependencyValidator';

const geometryDir = path.join(__dirname, '../src/geometry');

const unitSources = () =>
  fs.readdirSync(geometryDir)
    .filter(file => file.endsWith('.ts') && file !== 'index.ts' && file !== 'references.ts')
    .map(file => ({
      unit: path.basename(file, '.ts'),
      source: fs.readFileSync(path.join(geometryDir, file), 'utf8')
    }));

// Every value import form, including side-effect, namespace, default and
// multi-line ones; `import type` is erased on compile
const eagerImports = (unit: string, source: string): string[] =>
  [...source.matchAll(/^import\s+(?!type\s)[^;]*?'\.\/(\w+)';/gm)].map(m => `${unit}->${m[1]}`);

const deferredDeclarations = (source: string): string[] =>
  [...source.matchAll(/declareDeferred\(\s*'(\w+)',\s*'(\w+)',\s*methodScope\('([\w.]+)'\)/g)]
    .map(m => `${m[1]}->${m[2]}@${m[3]}`);

describe('Core Architecture', () => {
  test('should have one unit per registered entity type', () => {
    const units = unitSources().map(u => u.unit).sort();
    expect(units).toEqual([...layerRegistry.entityTypes()].sort());
  });

  test('should recognise every value import form', () => {
    const source = [
      "import { recordUnitLoad } from '../deferred';",
      "import type { Homset } from './Homset';",
      "import './Glue';",
      "import * as SpecUnit from './Spec';",
      "import Point from './Point';",
      'import {',
      '  Morphism,',
      '  type MorphismLike',
      "} from './Morphism';",
      "const lazy = (): typeof import('./Divisor') => require('./Divisor');"
    ].join('\n');

    expect(eagerImports('Scheme', source)).toEqual([
      'Scheme->Glue',
      'Scheme->Spec',
      'Scheme->Point',
      'Scheme->Morphism'
    ]);
  });

  test('should declare exactly the value imports the units make', () => {
    const actual = unitSources().flatMap(({ unit, source }) => eagerImports(unit, source)).sort();
    const declared = DECLARED_REFERENCES
      .filter(ref => ref.kind === 'eager')
      .map(ref => `${ref.from}->${ref.to}`)
      .sort();

    expect(actual).toEqual(declared);
  });

  test('should declare exactly the deferred references the units make', () => {
    const actual = unitSources().flatMap(({ source }) => deferredDeclarations(source)).sort();
    const declared = DECLARED_REFERENCES
      .filter(ref => ref.kind === 'deferred')
      .map(ref => `${ref.from}->${ref.to}@${ref.site}`)
      .sort();

    expect(actual).toEqual(declared);
  });

  test('should have proper layer separation', () => {
    const validator = new DependencyValidator();
    expect(validator.validate(validator.buildEagerGraph(DECLARED_REFERENCES))).toEqual([]);
  });

  test('should only defer references to later layers', () => {
    for (const ref of DECLARED_REFERENCES.filter(r => r.kind === 'deferred')) {
      expect(layerOf(ref.to)).toBeGreaterThanOrEqual(layerOf(ref.from));
    }
  });
});
