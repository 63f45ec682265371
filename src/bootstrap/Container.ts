/**
 * Typed injection token. The type parameter only exists at compile time.
 */
export interface Token<T> {
  readonly key: symbol;
  readonly __type?: T;
}

export function token<T>(description: string): Token<T> {
  return { key: Symbol(description) };
}

type Factory<T> = (container: Container) => T;

type Provider =
  | { kind: 'value'; value: unknown }
  | { kind: 'factory'; factory: Factory<unknown>; singleton: boolean };

export class Container {
  private readonly providers = new Map<symbol, Provider>();
  private readonly singletonCache = new Map<symbol, unknown>();

  has<T>(token: Token<T>): boolean {
    return this.providers.has(token.key);
  }

  register<T>(token: Token<T>, value: T): void {
    this.providers.set(token.key, { kind: 'value', value });
    this.singletonCache.delete(token.key);
  }

  /** The factory runs on every resolve. */
  factory<T>(token: Token<T>, factory: Factory<T>): void {
    this.providers.set(token.key, { kind: 'factory', factory, singleton: false });
    this.singletonCache.delete(token.key);
  }

  singleton<T>(token: Token<T>, factory: Factory<T>): void {
    this.providers.set(token.key, { kind: 'factory', factory, singleton: true });
    this.singletonCache.delete(token.key);
  }

  resolve<T>(token: Token<T>): T {
    const provider = this.providers.get(token.key);
    if (!provider) {
      throw new Error(`Container: no provider registered for token ${String(token.key.description)}`);
    }

    if (provider.kind === 'value') {
      return provider.value as T;
    }

    if (provider.singleton) {
      if (this.singletonCache.has(token.key)) {
        return this.singletonCache.get(token.key) as T;
      }
      const instance = provider.factory(this);
      this.singletonCache.set(token.key, instance);
      return instance as T;
    }

    return provider.factory(this) as T;
  }
}
