import { IDependencyValidator } from '../interfaces/DependencyValidator';
import { ILayerRegistry } from '../interfaces/LayerRegistry';
import { layerRegistry } from '../registry/LayerRegistry';
import {
  DeclaredReference,
  DeferralAdvice,
  EntityType,
  EntityTypeGraph,
  EntityTypeName,
  LayerViolation,
  ValidationReport
} from '../types';
import { LayerViolationError } from '../utils/errors';
import { Logger } from '../utils/logger';

export class DependencyValidator implements IDependencyValidator {
  private logger = new Logger('DependencyValidator')

  constructor(private registry: ILayerRegistry = layerRegistry) {}

  // Collects every violation in one pass; never stops at the first
  validate(graph: EntityTypeGraph): ValidationReport {
    const violations: LayerViolation[] = []
    const seen = new Set<string>()

    for (const entity of graph) {
      const fromLayer = this.registry.layerOf(entity.name)
      if (entity.layer !== fromLayer) {
        this.logger.debug(`${entity.name} declares layer ${entity.layer}, registry has ${fromLayer}`)
      }

      for (const target of entity.eagerReferences) {
        const toLayer = this.registry.layerOf(target)
        if (toLayer < fromLayer) continue

        const key = `${entity.name}->${target}`
        if (seen.has(key)) continue
        seen.add(key)

        violations.push({ fromType: entity.name, toType: target, fromLayer, toLayer })
      }
    }

    this.logger.debug(`Checked ${graph.length} entity types, ${violations.length} violation(s)`)
    return violations
  }

  assertValid(graph: EntityTypeGraph): void {
    const report = this.validate(graph)
    if (report.length > 0) {
      throw new LayerViolationError(report)
    }
  }

  // Deferred entries are dropped: they are not load-time dependencies
  buildEagerGraph(declared: readonly DeclaredReference[]): EntityTypeGraph {
    const references = new Map<EntityTypeName, EntityTypeName[]>()

    for (const ref of declared) {
      this.registry.layerOf(ref.from)
      this.registry.layerOf(ref.to)
      if (ref.kind !== 'eager') continue

      const targets = references.get(ref.from) ?? []
      if (!targets.includes(ref.to)) targets.push(ref.to)
      references.set(ref.from, targets)
    }

    return this.registry.entityTypes().map((name): EntityType => ({
      name,
      layer: this.registry.layerOf(name),
      eagerReferences: references.get(name) ?? []
    }))
  }

  auditDeferrals(declared: readonly DeclaredReference[]): DeferralAdvice[] {
    const advice: DeferralAdvice[] = []

    for (const reference of declared) {
      if (reference.kind !== 'deferred') continue

      const fromLayer = this.registry.layerOf(reference.from)
      const toLayer = this.registry.layerOf(reference.to)

      if (toLayer < fromLayer) {
        advice.push({
          kind: 'could-be-eager',
          reference,
          message: `${reference.from} -> ${reference.to} is deferred, but ${reference.to} (layer ${toLayer}) loads before ${reference.from} (layer ${fromLayer})`
        })
      }

      if (!reference.site) {
        advice.push({
          kind: 'missing-site',
          reference,
          message: `${reference.from} -> ${reference.to} is deferred without a call site`
        })
      }
    }

    return advice
  }
}
