import type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  IGraphDumpError,
} from "../types/error";
import { symbolError } from "../types/symbols";

export class GraphDumpError<
  TData extends DefaultErrorType = DefaultErrorType,
>
  extends Error
  implements IGraphDumpError<TData>
{
  public readonly data: TData;
  public readonly remediation?: string;

  constructor(
    public readonly id: string,
    message: string,
    data: TData,
    remediation?: string,
  ) {
    super(message);
    this.data = data;
    this.name = id;
    this.remediation = remediation;
  }

  toString(): string {
    const base = `${this.name}: ${this.message}`;
    return this.remediation ? `${base}\n\nRemediation: ${this.remediation}` : base;
  }
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;
  constructor(private readonly definition: IErrorDefinition<TData>) {}

  get id(): string {
    return this.definition.id;
  }

  throw(data: TData): never {
    const parsed = this.definition.dataSchema
      ? this.definition.dataSchema.parse(data)
      : data;
    throw new GraphDumpError(
      this.definition.id,
      this.formatMessage(parsed),
      parsed,
      this.formatRemediation(parsed),
    );
  }

  is(error: unknown): error is GraphDumpError<TData> {
    return error instanceof GraphDumpError && error.id === this.definition.id;
  }

  private formatMessage(data: TData): string {
    if (this.definition.format) {
      return this.definition.format(data);
    }
    return typeof data.message === "string" ? data.message : this.definition.id;
  }

  private formatRemediation(data: TData): string | undefined {
    const { remediation } = this.definition;
    if (typeof remediation === "function") {
      return remediation(data);
    }
    return remediation;
  }
}

/**
 * Create a new error helper.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
): ErrorHelper<TData> {
  return new ErrorHelper<TData>(definition);
}
