import type {
  DefaultErrorType,
  IErrorHelper,
  IErrorMeta,
  IValidationSchema,
} from "../../../types/error";

export interface ErrorFluentBuilder<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  dataSchema(schema: IValidationSchema<TData>): ErrorFluentBuilder<TData>;
  format(fn: (data: TData) => string): ErrorFluentBuilder<TData>;
  /**
   * Attach remediation advice that explains how to fix this error.
   * Appears in the stringified error after the main message.
   */
  remediation(
    advice: string | ((data: TData) => string),
  ): ErrorFluentBuilder<TData>;
  meta<TNewMeta extends IErrorMeta>(m: TNewMeta): ErrorFluentBuilder<TData>;
  build(): IErrorHelper<TData>;
}
