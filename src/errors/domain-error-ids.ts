export enum GraphDumpErrorId {
  AnonymousType = "graphdump.errors.anonymousType",
  UnresolvableTypeReference = "graphdump.errors.unresolvableTypeReference",
  StatefulSingleton = "graphdump.errors.statefulSingleton",
  UnsupportedShape = "graphdump.errors.unsupportedShape",
  UnrecognizedType = "graphdump.errors.unrecognizedType",
  VarIntRange = "graphdump.errors.varIntRange",
  DepthExceeded = "graphdump.errors.depthExceeded",
  StreamFinalized = "graphdump.errors.streamFinalized",
  InvalidOptions = "graphdump.errors.invalidOptions",
  TypeCatalog = "graphdump.errors.typeCatalog",
  UnregisteredReference = "graphdump.errors.unregisteredReference",
}
