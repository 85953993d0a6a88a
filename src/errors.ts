export * from "./errors/serializer.errors";
export { GraphDumpErrorId } from "./errors/domain-error-ids";
export { GraphDumpError } from "./definers/defineError";
