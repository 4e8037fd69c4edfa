import { EntityTypeName, ResolutionScope } from '../types';

export type CallScope = Exclude<ResolutionScope, { kind: 'module' }>;

/**
 * A dependency on a type whose unit must not load together with the
 * referencing unit. `load` runs only when the reference is resolved.
 */
export class DeferredReference<T> {
  private resolved: { value: T } | null = null

  constructor(
    readonly from: EntityTypeName,
    readonly to: EntityTypeName,
    readonly scope: CallScope,
    private readonly load: () => T
  ) {}

  get site(): string {
    return this.scope.site
  }

  get isResolved(): boolean {
    return this.resolved !== null
  }

  // evaluate and commit are used by the resolver only; a loaded value is
  // memoized once the resolver has accepted it
  evaluate(useMemo: boolean): { value: T; cached: boolean } {
    if (useMemo && this.resolved) {
      return { value: this.resolved.value, cached: true }
    }
    return { value: this.load(), cached: false }
  }

  commit(value: T): void {
    // Concurrent first use may land here twice; either result is equivalent
    this.resolved = { value }
  }

  toString(): string {
    return `${this.from} -> ${this.to} @ ${this.site}`
  }
}
