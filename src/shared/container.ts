import { getInjectedParams, isInjectable } from './decorators';

type Constructor<T> = new (...args: never[]) => T;
type Token = string | Constructor<unknown>;
type FactoryFunction<T> = () => T;

interface Binding {
  token: Token;
  factory: FactoryFunction<unknown>;
  singleton: boolean;
  instance?: unknown;
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

  bind<T>(token: Token, factory: FactoryFunction<T>, singleton: boolean = true): void {
    this.bindings.set(token, { token, factory, singleton });
  }

  /**
   * Binds a class whose constructor parameters are all marked with `@Inject(token)`.
   * Parameters are resolved in declaration order.
   */
  bindClass<T>(token: Token, constructor: new (...args: never[]) => T, singleton: boolean = true): void {
    if (!isInjectable(constructor)) {
      throw new Error(`Class ${constructor.name} is not marked @Injectable()`);
    }
    const params = getInjectedParams(constructor);
    if (params.length !== constructor.length) {
      throw new Error(
        `Class ${constructor.name} declares ${constructor.length} constructor parameters but only ${params.length} are injectable`,
      );
    }
    this.bind(
      token,
      () => Reflect.construct(constructor, params.map(({ token: paramToken }) => this.get(paramToken))),
      singleton,
    );
  }

  get<T>(token: Token): T {
    const binding = this.bindings.get(token);
    if (!binding) {
      throw new Error(`No binding found for token: ${typeof token === 'string' ? token : token.name}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      return binding.instance as T;
    }

    const instance = binding.factory();
    if (binding.singleton) {
      binding.instance = instance;
    }
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
