type EnvCastType = "string" | "number" | "boolean";

type EnvCastResult = {
  string: string;
  number: number;
  boolean: boolean;
};

const FALSY_VALUES = ["", "0", "false", "no", "undefined", "null"];

/**
 * Reads environment variables with type casting and defaults.
 * Values are read once per key and memoized.
 */
export class EnvironmentManager {
  private readonly envStore = new Map<string, string | undefined>();

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  private readonly castHandlers: {
    [K in EnvCastType]: (value: string) => EnvCastResult[K] | undefined;
  } = {
    string: (value) => value,
    number: (value) => {
      const parsed = parseFloat(value);
      return isNaN(parsed) ? undefined : parsed;
    },
    boolean: (value) => !FALSY_VALUES.includes(value.toLowerCase()),
  };

  /** Raw value, or undefined when the variable is unset. */
  public raw(key: string): string | undefined {
    if (!this.envStore.has(key)) {
      this.envStore.set(key, this.source[key]);
    }
    return this.envStore.get(key);
  }

  /** Cast value, or the default when the variable is unset or unparsable. */
  public get<K extends EnvCastType>(
    key: string,
    cast: K,
    defaultValue: EnvCastResult[K],
  ): EnvCastResult[K] {
    const rawValue = this.raw(key);
    if (rawValue === undefined) {
      return defaultValue;
    }
    return this.castHandlers[cast](rawValue) ?? defaultValue;
  }

  /** Raw value when it is one of `allowed`, otherwise the default. */
  public oneOf<T extends string>(
    key: string,
    allowed: readonly T[],
    defaultValue: T,
  ): T {
    const rawValue = this.raw(key);
    return allowed.find((candidate) => candidate === rawValue) ?? defaultValue;
  }
}
