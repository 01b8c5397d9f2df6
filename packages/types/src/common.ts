// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

export type InjectionToken = string | symbol | Type;

export type ClassProvider<T> = {
  useClass: Type<T>;
  onClose?: (value: T) => Promise<void> | void;
};

export type FactoryProvider<T> = {
  useFactory: (...args: unknown[]) => T | Promise<T>;
  inject?: InjectionToken[];
  onClose?: (value: T) => Promise<void> | void;
};

export type ValueProvider<T> = {
  useValue: T;
  onClose?: (value: T) => Promise<void> | void;
};

export type Provider<T = unknown> = ClassProvider<T> | FactoryProvider<T> | ValueProvider<T>;
