export type BindingOrigin = 'call' | 'subscript' | 'mask' | 'other';

/**
 * Names bound in one scope, with every kind of expression each was bound to.
 * Only grows: rebinding a name adds an origin, it never drops one.
 */
export class RuleContext {
  private readonly bindings = new Map<string, Set<BindingOrigin>>();

  bind(name: string, origin: BindingOrigin): void {
    let origins = this.bindings.get(name);
    if (!origins) {
      origins = new Set();
      this.bindings.set(name, origins);
    }
    origins.add(origin);
  }

  wasBoundBy(name: string, origin: BindingOrigin): boolean {
    return this.bindings.get(name)?.has(origin) ?? false;
  }
}
