import { Constructor, Token, getInjectedParams, isInjectable } from './decorators';

type FactoryFunction<T> = () => T;

interface Binding<T = unknown> {
  token: Token<T>;
  factory: FactoryFunction<T>;
  singleton: boolean;
  instance?: T;
}

export class DIContainer {
  private bindings: Map<Token, Binding> = new Map();
  private static instance: DIContainer;

  static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  bind<T>(token: Token<T>, factory: FactoryFunction<T>, singleton: boolean = true): void {
    this.bindings.set(token, { token, factory, singleton });
  }

  bindClass<T>(token: Token<T>, constructor: Constructor<T>, singleton: boolean = true): void {
    this.bind(
      token,
      () => {
        const args = getInjectedParams(constructor).map(({ token: paramToken }) => {
          try {
            return this.get(paramToken);
          } catch (error) {
            // If dependency is not found and it's an injectable class, try to auto-register it
            if (typeof paramToken === 'function' && isInjectable(paramToken)) {
              this.bindClass(paramToken, paramToken);
              return this.get(paramToken);
            }
            throw error;
          }
        });
        return new constructor(...args);
      },
      singleton,
    );
  }

  get<T>(token: Token<T>): T {
    const binding = this.bindings.get(token);

    if (!binding) {
      // Auto-register injectable classes
      if (typeof token === 'function' && isInjectable(token)) {
        this.bindClass(token, token);
        return this.get(token);
      }
      throw new Error(`No binding found for token: ${describeToken(token)}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      return binding.instance as T;
    }

    const instance = binding.factory();

    if (binding.singleton) {
      binding.instance = instance;
    }

    // Bindings are keyed by token; bind<T> stores a factory of the token's type.
    return instance as T;
  }

  has(token: Token): boolean {
    return this.bindings.has(token);
  }

  unbind(token: Token): void {
    this.bindings.delete(token);
  }

  clear(): void {
    this.bindings.clear();
  }
}

function describeToken(token: Token): string {
  return typeof token === 'string' ? token : token.name;
}
