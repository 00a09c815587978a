import 'reflect-metadata';

const INJECTABLE_METADATA_KEY = 'injectable';
const INJECT_METADATA_KEY = 'inject';

export type Constructor<T = unknown> = new (...args: any[]) => T;
export type Token<T = unknown> = string | Constructor<T>;

export interface InjectedParam {
  index: number;
  token: Token;
}

export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, true, target);
  };
}

export function Inject(token: Token): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existingInjections: InjectedParam[] = Reflect.getMetadata(INJECT_METADATA_KEY, target) ?? [];
    Reflect.defineMetadata(
      INJECT_METADATA_KEY,
      [...existingInjections, { index: parameterIndex, token }],
      target,
    );
  };
}

export function isInjectable(target: object): boolean {
  return Reflect.getMetadata(INJECTABLE_METADATA_KEY, target) === true;
}

/** Constructor injections ordered by parameter position. */
export function getInjectedParams(target: object): InjectedParam[] {
  const injections: InjectedParam[] = Reflect.getMetadata(INJECT_METADATA_KEY, target) ?? [];
  return [...injections].sort((a, b) => a.index - b.index);
}
