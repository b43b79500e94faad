import { InputConfigurationError } from './errors.js';

export type VariantOptions = Readonly<Record<string, unknown>>;

export type VariantFactory<TInstance, TContext> = (
  options: VariantOptions,
  context: TContext,
) => TInstance;

/**
 * Table of host-registered modifier or condition kinds, keyed by name.
 *
 * Built-in kinds are a closed union; this table is the extension point for
 * the rest.
 */
export class VariantRegistry<TInstance, TContext> {
  private readonly factories = new Map<string, VariantFactory<TInstance, TContext>>();

  constructor(private readonly label: string) {}

  register(name: string, factory: VariantFactory<TInstance, TContext>): void {
    if (name.trim().length === 0) {
      throw new InputConfigurationError(`Custom ${this.label} name must not be blank.`);
    }
    if (this.factories.has(name)) {
      throw new InputConfigurationError(
        `Custom ${this.label} "${name}" registered multiple times.`,
      );
    }
    this.factories.set(name, factory);
  }

  unregister(name: string): boolean {
    return this.factories.delete(name);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }

  create(name: string, options: VariantOptions, context: TContext): TInstance {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new InputConfigurationError(`Unknown custom ${this.label} "${name}".`, [
        {
          code: `${this.label}.unknownCustomKind`,
          message: `No custom ${this.label} registered under "${name}".`,
          path: ['name'],
        },
      ]);
    }
    return factory(options, context);
  }
}
