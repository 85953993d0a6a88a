import { describe, it, expect } from "@jest/globals";
import {
  anonymousTypeError,
  depthExceededError,
  GraphDumpError,
  GraphDumpErrorId,
  invalidOptionsError,
  statefulSingletonError,
  streamFinalizedError,
  typeCatalogError,
  unrecognizedTypeError,
  unregisteredReferenceError,
  unresolvableTypeReferenceError,
  unsupportedShapeError,
  varIntRangeError,
} from "../errors";

const messageOf = (fn: () => void): string => {
  try {
    fn();
  } catch (error) {
    if (error instanceof GraphDumpError) {
      return error.message;
    }
    throw error;
  }
  throw new Error("expected a failure");
};

describe("graphdump errors", () => {
  it("use ids under graphdump.errors", () => {
    const helpers = [
      anonymousTypeError,
      unresolvableTypeReferenceError,
      statefulSingletonError,
      unsupportedShapeError,
      unrecognizedTypeError,
      varIntRangeError,
      depthExceededError,
      streamFinalizedError,
      invalidOptionsError,
      typeCatalogError,
      unregisteredReferenceError,
    ];

    expect(helpers.map((helper) => helper.id).sort()).toEqual(
      Object.values(GraphDumpErrorId).sort(),
    );
  });

  it("format their messages from data", () => {
    expect(
      messageOf(() => anonymousTypeError.throw({ kind: "module", name: "#<Module:0x1>" })),
    ).toBe("can't dump anonymous module #<Module:0x1>");
    expect(
      messageOf(() => unresolvableTypeReferenceError.throw({ name: "App::Gone" })),
    ).toBe("App::Gone can't be referred");
    expect(messageOf(() => statefulSingletonError.throw({ name: "x" }))).toBe(
      "singleton can't be dumped",
    );
    expect(
      messageOf(() =>
        unsupportedShapeError.throw({ shape: "regexp", typeName: "Regexp" }),
      ),
    ).toBe("regexp values are not supported (can't dump Regexp)");
    expect(messageOf(() => unrecognizedTypeError.throw({ typeName: "Set" }))).toBe(
      "can't pack Set",
    );
    expect(messageOf(() => depthExceededError.throw({ maxDepth: 3 }))).toBe(
      "Maximum depth exceeded (3)",
    );
    expect(messageOf(() => invalidOptionsError.throw({ message: "bad" }))).toBe(
      "Invalid serializer options: bad",
    );
    expect(
      messageOf(() => unregisteredReferenceError.throw({ subject: "a value" })),
    ).toBe("Cannot link a value that was never registered");
  });

  it("carry remediation advice", () => {
    try {
      unresolvableTypeReferenceError.throw({ name: "App::Gone" });
    } catch (error) {
      expect(unresolvableTypeReferenceError.is(error)).toBe(true);
      if (unresolvableTypeReferenceError.is(error)) {
        expect(error.remediation).toBe(
          'Register the type under "App::Gone" so that the name resolves back to the same class or module.',
        );
        expect(error.data).toEqual({ name: "App::Gone" });
      }
    }
  });
});
