import {
  anonymousTypeError,
  depthExceededError as depthExceededHelper,
  invalidOptionsError,
  statefulSingletonError,
  streamFinalizedError as streamFinalizedHelper,
  typeCatalogError as typeCatalogHelper,
  unrecognizedTypeError,
  unresolvableTypeReferenceError,
  unregisteredReferenceError,
  unsupportedShapeError as unsupportedShapeHelper,
  varIntRangeError as varIntRangeHelper,
} from "../errors";

const toError = <T>(thrower: (data: T) => never, data: T): Error => {
  try {
    thrower(data);
  } catch (error: unknown) {
    if (error instanceof Error) {
      return error;
    }
    throw error;
  }
};

export const anonymousError = (kind: "class" | "module", name: string): Error =>
  toError(anonymousTypeError.throw.bind(anonymousTypeError), { kind, name });

export const unresolvableReferenceError = (name: string): Error =>
  toError(
    unresolvableTypeReferenceError.throw.bind(unresolvableTypeReferenceError),
    { name },
  );

export const singletonError = (name: string): Error =>
  toError(statefulSingletonError.throw.bind(statefulSingletonError), {
    name,
  });

export const unsupportedShapeError = (shape: string, typeName: string): Error =>
  toError(unsupportedShapeHelper.throw.bind(unsupportedShapeHelper), {
    shape,
    typeName,
  });

export const unrecognizedError = (typeName: string): Error =>
  toError(unrecognizedTypeError.throw.bind(unrecognizedTypeError), {
    typeName,
  });

export const varIntRangeError = (message: string): Error =>
  toError(varIntRangeHelper.throw.bind(varIntRangeHelper), { message });

export const depthExceededError = (maxDepth: number): Error =>
  toError(depthExceededHelper.throw.bind(depthExceededHelper), { maxDepth });

export const streamFinalizedError = (): Error =>
  toError(streamFinalizedHelper.throw.bind(streamFinalizedHelper), {});

export const optionsError = (message: string): Error =>
  toError(invalidOptionsError.throw.bind(invalidOptionsError), { message });

export const typeCatalogError = (message: string): Error =>
  toError(typeCatalogHelper.throw.bind(typeCatalogHelper), { message });

export const unregisteredLinkError = (subject: string): Error =>
  toError(unregisteredReferenceError.throw.bind(unregisteredReferenceError), {
    subject,
  });
