import { symbolError } from "./symbols";

export type DefaultErrorType = Record<string, unknown>;

/**
 * Anything exposing a zod-like `parse`. Used to validate error data on throw().
 */
export interface IValidationSchema<T = unknown> {
  /**
   * Parse and validate the input data.
   * Should throw an error if validation fails.
   */
  parse(input: unknown): T;
}

export interface IErrorMeta {
  title?: string;
  description?: string;
}

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Advice on how to fix the error. Kept apart from the message.
   */
  remediation?: string | ((data: TData) => string);
  /**
   * Validate error data on throw(). If provided, data is parsed first.
   */
  dataSchema?: IValidationSchema<TData>;
  meta?: IErrorMeta;
}

/** Shape of the errors thrown by an error helper. */
export interface IGraphDumpError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error {
  readonly id: string;
  readonly data: TData;
  readonly remediation?: string;
}

/**
 * Runtime helper returned by defineError()/error().build().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique error id, also used as the thrown error's `name` */
  id: string;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is IGraphDumpError<TData>;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}
