import { z } from "zod";
import { EnvironmentManager } from "../models/EnvironmentManager";
import { Logger, type LogLevels } from "../models/Logger";
import { optionsError } from "./errors";
import type { ValueModel } from "./model/types";
import type { SerializerFormat } from "./packers/types";

export const DEFAULT_MAX_DEPTH = 1000;
export const DEFAULT_FORMAT: SerializerFormat = "marshal";

export const FORMAT_ENV = "GRAPHDUMP_FORMAT";
export const LOG_LEVEL_ENV = "GRAPHDUMP_LOG_LEVEL";
export const MAX_DEPTH_ENV = "GRAPHDUMP_MAX_DEPTH";
export const ENCODING_METADATA_ENV = "GRAPHDUMP_ENCODING_METADATA";

const FORMATS: readonly SerializerFormat[] = ["marshal", "msgpack"];
const LOG_LEVELS: readonly LogLevels[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "critical",
];

export interface SerializerOptions {
  format?: SerializerFormat;
  /** Annotate strings and regexps with their encoding. Defaults to true. */
  encodingMetadata?: boolean;
  /** Maximum nesting depth of one dump. Defaults to 1000. */
  maxDepth?: number;
  logger?: Logger;
  /** Object model to walk instead of plain JS values. */
  model?: ValueModel<unknown>;
}

export interface WriterSettings {
  format: SerializerFormat;
  encodingMetadata: boolean;
  maxDepth: number;
}

export interface NormalizedSerializerOptions extends WriterSettings {
  logger: Logger;
  model: ValueModel<unknown> | undefined;
}

export const writerSettingsSchema = z
  .object({
    format: z.enum(["marshal", "msgpack"]).optional(),
    encodingMetadata: z.boolean().optional(),
    maxDepth: z
      .union([z.number().int().nonnegative(), z.literal(Infinity)])
      .optional(),
  })
  .strict();

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");

/** Logger used when none is given: silent unless GRAPHDUMP_LOG_LEVEL is set. */
export const createDefaultLogger = (env: EnvironmentManager): Logger => {
  const level = env.get(LOG_LEVEL_ENV, "string", "");
  const threshold = LOG_LEVELS.find((candidate) => candidate === level);
  return new Logger({
    printThreshold: threshold ?? null,
    printStrategy: "pretty",
  });
};

export function normalizeSerializerOptions(
  options: SerializerOptions = {},
  env: EnvironmentManager = new EnvironmentManager(),
): NormalizedSerializerOptions {
  const { logger, model, ...settings } = options;
  const parsed = writerSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw optionsError(describeIssues(parsed.error));
  }
  if (logger !== undefined && !(logger instanceof Logger)) {
    throw optionsError("logger: expected a Logger instance");
  }

  const maxDepth =
    parsed.data.maxDepth ?? env.get(MAX_DEPTH_ENV, "number", DEFAULT_MAX_DEPTH);
  if (!writerSettingsSchema.shape.maxDepth.safeParse(maxDepth).success) {
    throw optionsError(
      `${MAX_DEPTH_ENV}: expected a non-negative integer or Infinity`,
    );
  }

  return {
    format:
      parsed.data.format ?? env.oneOf(FORMAT_ENV, FORMATS, DEFAULT_FORMAT),
    encodingMetadata:
      parsed.data.encodingMetadata ??
      env.get(ENCODING_METADATA_ENV, "boolean", true),
    maxDepth,
    logger: logger ?? createDefaultLogger(env),
    model,
  };
}
