import { error } from "../definers/builders/error";
import type { DefaultErrorType } from "../types/error";
import { GraphDumpErrorId } from "./domain-error-ids";

export const anonymousTypeError = error<
  { kind: "class" | "module"; name: string } & DefaultErrorType
>(GraphDumpErrorId.AnonymousType)
  .format(({ kind, name }) => `can't dump anonymous ${kind} ${name}`)
  .remediation(
    "Give the class a name and register it in the type catalog before dumping its instances.",
  )
  .build();

export const unresolvableTypeReferenceError = error<
  { name: string } & DefaultErrorType
>(GraphDumpErrorId.UnresolvableTypeReference)
  .format(({ name }) => `${name} can't be referred`)
  .remediation(
    ({ name }) =>
      `Register the type under "${name}" so that the name resolves back to the same class or module.`,
  )
  .build();

export const statefulSingletonError = error<
  { name: string } & DefaultErrorType
>(GraphDumpErrorId.StatefulSingleton)
  .format(() => "singleton can't be dumped")
  .remediation(
    "Remove per-instance methods or state from the value before dumping it.",
  )
  .build();

export const unsupportedShapeError = error<
  { shape: string; typeName: string } & DefaultErrorType
>(GraphDumpErrorId.UnsupportedShape)
  .format(
    ({ shape, typeName }) =>
      `${shape} values are not supported (can't dump ${typeName})`,
  )
  .remediation(
    "Convert the value to nil, a boolean, a number, a string, an array or a hash before dumping.",
  )
  .build();

export const unrecognizedTypeError = error<
  { typeName: string } & DefaultErrorType
>(GraphDumpErrorId.UnrecognizedType)
  .format(({ typeName }) => `can't pack ${typeName}`)
  .build();

export const varIntRangeError = error<{ message: string } & DefaultErrorType>(
  GraphDumpErrorId.VarIntRange,
)
  .format(({ message }) => message)
  .remediation("VarInt values must be 32-bit signed integers.")
  .build();

export const depthExceededError = error<{ maxDepth: number } & DefaultErrorType>(
  GraphDumpErrorId.DepthExceeded,
)
  .format(({ maxDepth }) => `Maximum depth exceeded (${maxDepth})`)
  .remediation(
    "Increase maxDepth only when needed; very deep graphs can exhaust the call stack.",
  )
  .build();

export const streamFinalizedError = error<DefaultErrorType>(
  GraphDumpErrorId.StreamFinalized,
)
  .format(() => "The output stream has already been finalized")
  .remediation(
    "A writer finalizes its sink once its top-level write completes. Create a new writer and sink for the next dump.",
  )
  .build();

export const invalidOptionsError = error<{ message: string } & DefaultErrorType>(
  GraphDumpErrorId.InvalidOptions,
)
  .format(({ message }) => `Invalid serializer options: ${message}`)
  .build();

export const typeCatalogError = error<{ message: string } & DefaultErrorType>(
  GraphDumpErrorId.TypeCatalog,
)
  .format(({ message }) => message)
  .remediation(
    "Register each class or module once, under a unique non-anonymous name.",
  )
  .build();

export const unregisteredReferenceError = error<
  { subject: string } & DefaultErrorType
>(GraphDumpErrorId.UnregisteredReference)
  .format(({ subject }) => `Cannot link ${subject} that was never registered`)
  .remediation(
    "Register the object or symbol with the writer before emitting a link to it.",
  )
  .build();
