import EventEmitter from 'eventemitter3';
import { DEFAULT_SETTINGS, LayeringSettings } from '../config/settings';
import { IDeferredResolver } from '../interfaces/DeferredResolver';
import { ILayerRegistry } from '../interfaces/LayerRegistry';
import { layerRegistry } from '../registry/LayerRegistry';
import { EntityTypeName, ResolutionScope, ResolvedEvent } from '../types';
import { InvalidScopeError, ReflexiveLoadError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { DeferredReference } from './DeferredReference';
import { UnitLedger, unitLedger } from './UnitLedger';

interface ResolverEvents {
  resolved: (event: ResolvedEvent) => void;
}

export interface DeferredResolverOptions {
  registry?: ILayerRegistry;
  ledger?: UnitLedger;
  settings?: LayeringSettings;
}

export class DeferredResolver extends EventEmitter<ResolverEvents> implements IDeferredResolver {
  private registry: ILayerRegistry
  private ledger: UnitLedger
  private settings: LayeringSettings
  private logger = new Logger('DeferredResolver')

  constructor(options: DeferredResolverOptions = {}) {
    super()
    this.registry = options.registry ?? layerRegistry
    this.ledger = options.ledger ?? unitLedger
    this.settings = options.settings ?? DEFAULT_SETTINGS
  }

  declareDeferred<T>(
    from: EntityTypeName,
    to: EntityTypeName,
    scope: ResolutionScope,
    load: () => T
  ): DeferredReference<T> {
    const fromLayer = this.registry.layerOf(from)
    const toLayer = this.registry.layerOf(to)

    if (scope.kind === 'module') {
      throw new InvalidScopeError(from, to, scope.kind)
    }

    if (this.settings.resolver.adviseUnneededDeferral && toLayer < fromLayer) {
      this.logger.debug(`${from} -> ${to} at ${scope.site} could be an eager reference`)
    }

    return new DeferredReference(from, to, scope, load)
  }

  resolve<T>(ref: DeferredReference<T>): T {
    const before = this.ledger.loadCount(ref.from)
    const { value, cached } = ref.evaluate(this.settings.resolver.cache)

    if (this.ledger.loadCount(ref.from) > before) {
      throw new ReflexiveLoadError(ref.from, ref.to)
    }

    if (!cached) {
      ref.commit(value)
      this.logger.debug(`Resolved ${ref}`)
    }
    this.emit('resolved', { from: ref.from, to: ref.to, site: ref.site, cached })
    return value
  }
}
