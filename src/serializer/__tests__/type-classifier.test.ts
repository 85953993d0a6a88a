import { describe, it, expect } from "@jest/globals";
import { classifyJsValue, FIXNUM_MAX } from "../type-classifier";
import { ByteString } from "../model/ByteString";
import { JsValueModel } from "../model/JsValueModel";
import { TypeCatalog } from "../model/type-catalog";
import { NativeShape, realClassOf } from "../model/types";
import { typeCatalogError } from "../../errors";

class Point {
  constructor(
    public x: number,
    public y: number,
  ) {}
}

class Stack extends Array<unknown> {}

class Registry extends Map<string, unknown> {}

const anonymousArrayClass = () => class extends Array<unknown> {};

describe("classifyJsValue", () => {
  const catalog = new TypeCatalog();
  const kindOf = (value: unknown) => classifyJsValue(value, catalog).kind;

  it("maps scalars to their shapes", () => {
    expect(kindOf(null)).toBe(NativeShape.Nil);
    expect(kindOf(undefined)).toBe(NativeShape.Nil);
    expect(kindOf(true)).toBe(NativeShape.True);
    expect(kindOf(false)).toBe(NativeShape.False);
    expect(kindOf(42)).toBe(NativeShape.Fixnum);
    expect(kindOf(2 ** 53)).toBe(NativeShape.Float);
    expect(kindOf(0.25)).toBe(NativeShape.Float);
    expect(kindOf(NaN)).toBe(NativeShape.Float);
    expect(kindOf(-0)).toBe(NativeShape.Float);
    expect(kindOf(0)).toBe(NativeShape.Fixnum);
    expect(kindOf(FIXNUM_MAX)).toBe(NativeShape.Fixnum);
    expect(kindOf(FIXNUM_MAX + 1n)).toBe(NativeShape.Bignum);
    expect(kindOf("text")).toBe(NativeShape.String);
    expect(kindOf(Symbol("tag"))).toBe(NativeShape.Symbol);
  });

  it("carries payloads for encodable shapes", () => {
    expect(classifyJsValue(7, catalog)).toEqual({
      kind: NativeShape.Fixnum,
      value: 7,
    });
    expect(classifyJsValue({ a: 1 }, catalog)).toEqual({
      kind: NativeShape.Hash,
      entries: [["a", 1]],
    });
    expect(classifyJsValue(new Map([[1, "one"]]), catalog)).toEqual({
      kind: NativeShape.Hash,
      entries: [[1, "one"]],
    });
    const bytes = Uint8Array.of(1, 2);
    expect(classifyJsValue(new ByteString(bytes), catalog)).toEqual({
      kind: NativeShape.String,
      content: bytes,
    });
  });

  it("keeps the intrinsic shape of subclassed containers", () => {
    expect(kindOf(new Stack())).toBe(NativeShape.Array);
    expect(kindOf(new Registry())).toBe(NativeShape.Hash);
    expect(kindOf(Object.create(null))).toBe(NativeShape.Hash);
  });

  it("classifies classes, regexps, structs and instances", () => {
    const structs = new TypeCatalog();
    structs.registerStruct(Point, "Point");

    expect(kindOf(Point)).toBe(NativeShape.Class);
    expect(kindOf(/ab+/)).toBe(NativeShape.Regexp);
    expect(kindOf(new Point(1, 2))).toBe(NativeShape.Object);
    expect(classifyJsValue(new Point(1, 2), structs).kind).toBe(
      NativeShape.Struct,
    );
  });

  it("treats opaque built-ins as unrecognized", () => {
    expect(kindOf(new Date(0))).toBe("unrecognized");
    expect(kindOf(new Set([1]))).toBe("unrecognized");
    expect(kindOf(new Uint8Array(2))).toBe("unrecognized");
    expect(kindOf(new Error("boom"))).toBe("unrecognized");
    expect(kindOf(Promise.resolve(1))).toBe("unrecognized");
  });
});

describe("JsValueModel", () => {
  it("reports built-in types for plain values", () => {
    const model = new JsValueModel();
    expect(model.typeOf("x").name).toBe("String");
    expect(model.typeOf([]).name).toBe("Array");
    expect(model.typeOf({}).name).toBe("Hash");
    expect(model.typeOf(new Map()).name).toBe("Hash");
    expect(model.typeOf(12).name).toBe("Integer");
    expect(model.typeOf(null).name).toBe("NilClass");
    expect(model.typeOf(ByteString.fromText("x")).name).toBe("String");
  });

  it("reports subclasses through the catalog", () => {
    const model = new JsValueModel();
    model.catalog.registerClass(Stack, "App::Stack");

    const type = model.typeOf(new Stack());
    expect(type.name).toBe("App::Stack");
    expect(type.superclass?.name).toBe("Array");
    expect(model.resolveType("App::Stack")).toBe(type);
    expect(model.typeOf(new Registry()).name).toBe("Registry");
    expect(model.resolveType("Registry")).toBeUndefined();
  });

  it("names anonymous classes with a # prefix", () => {
    const model = new JsValueModel();
    const Anonymous = anonymousArrayClass();
    expect(model.typeOf(new Anonymous()).name).toBe("#<Class:0x0001>");
  });

  it("exposes module registrations as included modules", () => {
    const model = new JsValueModel();
    model.catalog.registerModule(Stack, "Stackable");

    const type = model.typeOf(new Stack());
    expect(type.includedModule?.name).toBe("Stackable");
    expect(type.includedModule?.kind).toBe("module");
    expect(realClassOf(type).name).toBe("Array");
    expect(model.resolveType("Stackable")).toBe(type.includedModule);
  });

  it("lists instance variables without elements or methods", () => {
    const model = new JsValueModel();
    const list = Object.assign([1, 2], { label: "pair" });
    const bytes = Object.assign(ByteString.fromText("x"), { lang: "en" });

    expect(model.variablesOf(list)).toEqual([["@label", "pair"]]);
    expect(model.variablesOf(bytes)).toEqual([["@lang", "en"]]);
    expect(model.variablesOf(new Point(3, 4))).toEqual([
      ["@x", 3],
      ["@y", 4],
    ]);
    expect(model.variablesOf({ a: 1 })).toEqual([]);
    expect(model.variablesOf("text")).toEqual([]);
  });

  it("marks values with own methods as stateful singletons", () => {
    const model = new JsValueModel();
    const list = Object.assign([1], { total: () => 1 });

    const type = model.typeOf(list);
    expect(type.singleton).toEqual({ hasState: true });
    expect(type.superclass?.name).toBe("Array");
    expect(model.variablesOf(list)).toEqual([]);
  });

  it("gives identity to objects only", () => {
    const model = new JsValueModel();
    const list: unknown[] = [];
    expect(model.identityOf(list)).toBe(list);
    expect(model.identityOf(Point)).toBe(Point);
    expect(model.identityOf("text")).toBeUndefined();
    expect(model.identityOf(3)).toBeUndefined();
  });

  it("reports encodings of strings and regexps", () => {
    const model = new JsValueModel();
    expect(model.encodingOf("text")).toBe("UTF-8");
    expect(model.encodingOf(/x/)).toBe("UTF-8");
    expect(model.encodingOf(new ByteString(Uint8Array.of(1)))).toBe(
      "ASCII-8BIT",
    );
    expect(model.encodingOf(new ByteString(Uint8Array.of(1), null))).toBeNull();
    expect(model.encodingOf([])).toBeUndefined();
  });
});

describe("TypeCatalog", () => {
  it("rejects invalid and duplicate registrations", () => {
    const catalog = new TypeCatalog();
    catalog.registerClass(Stack, "Stack");

    expect(() => catalog.registerClass(Registry, "#<Class:0x1>")).toThrow(
      'Invalid type name "#<Class:0x1>"',
    );
    expect(() => catalog.registerClass(Stack, "Other")).toThrow(
      'Constructor "Stack" is already registered',
    );
    expect(() => catalog.registerStruct(Point, "Stack")).toThrow(
      'Type with name "Stack" already exists',
    );

    try {
      catalog.registerModule(Registry, "");
      throw new Error("expected a failure");
    } catch (error) {
      expect(typeCatalogError.is(error)).toBe(true);
    }
  });

  it("lists entries and resolves built-in names", () => {
    const catalog = new TypeCatalog();
    catalog.registerStruct(Point, "Geo::Point");

    expect(catalog.getEntries()).toEqual([
      { ctor: Point, name: "Geo::Point", kind: "struct" },
    ]);
    expect(catalog.resolve("Array")?.name).toBe("Array");
    expect(catalog.resolve("Geo::Point")?.name).toBe("Geo::Point");
    expect(catalog.resolve("Missing")).toBeUndefined();
  });
});
