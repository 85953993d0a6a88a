import { error as errorFn } from "./definers/builders/error";
import { getDefaultSerializer } from "./serializer";

/** Dumps `root` with the shared default serializer. */
export function dump(root: unknown): Uint8Array {
  return getDefaultSerializer().dump(root);
}

export * from "./serializer";
export * from "./errors";
export { Logger } from "./models/Logger";
export type {
  ILog,
  ILogInfo,
  LogLevels,
  LogListener,
  LoggerOptions,
  PrintStrategy,
} from "./models/Logger";
export { EnvironmentManager } from "./models/EnvironmentManager";
export { errorFn as error };
export type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  IGraphDumpError,
} from "./types/error";
