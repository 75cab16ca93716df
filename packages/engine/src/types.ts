// ────────────────────────────────────────────────────────────
// Cache Manager Codegen — Core Type Definitions
// ────────────────────────────────────────────────────────────

// ── Descriptor Model ───────────────────────────────────────

/** A message type referenced by an RPC method */
export interface TypeRef {
  /** Fully-qualified proto name without the leading dot: "shop.v1.Order.Line" */
  readonly fullName: string;
  /** Identifier inside the declaring file: "Order_Line" */
  readonly localName: string;
  /** Name relative to the proto package: "Order.Line" */
  readonly scopedName: string;
  /** Proto file that declares the message: "shop/v1/order.proto" */
  readonly file: string;
}

export interface MethodDescriptor {
  readonly name: string;                 // "GetOrder"
  readonly input: TypeRef;
  readonly output: TypeRef;
  /** Raw leading comment as protoc reports it: " Fetches an order.\n" */
  readonly leadingComment?: string;
  /** Name of the owning service */
  readonly parent: string;
  readonly clientStreaming: boolean;
  readonly serverStreaming: boolean;
}

export interface ServiceDescriptor {
  readonly name: string;                 // "OrderCache"
  readonly methods: ReadonlyArray<MethodDescriptor>;
  readonly leadingComment?: string;
}

export interface FileDescriptor {
  readonly name: string;                 // "shop/v1/order.proto"
  readonly protoPackage: string;         // "shop.v1"
  /** Listed in file_to_generate */
  readonly generate: boolean;
  /** Proto path minus the .proto extension: "shop/v1/order" */
  readonly filenamePrefix: string;
  /** Go package name for generated Go sources */
  readonly goPackageName: string;
  /** Go import path of the package: "example.com/shop/v1" */
  readonly goImportPath: string;
  readonly services: ReadonlyArray<ServiceDescriptor>;
}

// ── Manager Plan ───────────────────────────────────────────
// Language-neutral description of one generated manager.
// Doc comments are kept as comment bodies: the text that follows
// the comment marker on each line, leading space included.

export type DocLines = ReadonlyArray<string>;

export interface ManagerField {
  readonly name: string;                 // "orderCacheManager_GetOrder"
  readonly method: MethodDescriptor;
}

export interface UpdateParam {
  readonly name: string;                 // "updateGetOrderFn"
  readonly method: MethodDescriptor;
}

export interface CacheConstruction {
  /** Local holding the constructed handle; same as the field it populates */
  readonly variable: string;
  /** Logical cache name handed to the runtime: "getorder" */
  readonly cacheName: string;
  readonly updateParam: string;
  readonly method: MethodDescriptor;
}

export type WrapperKind = 'get' | 'refresh';

export interface WrapperMethod {
  readonly kind: WrapperKind;
  readonly name: string;                 // "GetGetOrder" | "RefreshGetOrder"
  readonly field: string;
  readonly method: MethodDescriptor;
  readonly doc?: DocLines;
}

export interface ManagerPlan {
  readonly service: ServiceDescriptor;
  readonly managerName: string;          // "OrderCacheManager"
  readonly constructorName: string;      // "NewOrderCacheManager"
  readonly typeDoc?: DocLines;
  readonly constructorDoc?: DocLines;
  readonly fields: ReadonlyArray<ManagerField>;
  readonly updateParams: ReadonlyArray<UpdateParam>;
  readonly constructions: ReadonlyArray<CacheConstruction>;
  readonly wrappers: ReadonlyArray<WrapperMethod>;
}

// ── Generated Output ───────────────────────────────────────

export interface GeneratedFile {
  readonly name: string;                 // "shop/v1/order_cache_manager.pb.go"
  readonly content: string;
}

// ── Configuration ──────────────────────────────────────────

export type Target = 'go' | 'ts';

/** Extension appended to relative imports in generated TypeScript */
export type ImportExtension = '.js' | '.ts' | '';

/** Layout of Go output: under the Go import path, or beside the .proto */
export type GoPathMode = 'import' | 'source_relative';

export interface GeneratorConfig {
  target: Target;
  /** Marker suffix that selects a service for generation */
  suffix: string;
  /** Import path of the Go cache-manager runtime package */
  goRuntimeImport: string;
  /** Module specifier of the TypeScript cache-manager runtime */
  tsRuntimeModule: string;
  importExtension: ImportExtension;
  goPaths: GoPathMode;
  /** Import path prefix stripped from Go output names (paths=import only) */
  goModule: string;
  /** Go import path per proto file, overriding go_package ("M" parameters) */
  goImportMap: Readonly<Record<string, string>>;
}

export interface TargetRenderer {
  readonly target: Target;
  /** Map proto names to the identifiers the target's message code uses */
  nameService(service: ServiceDescriptor): ServiceDescriptor;
  fileName(file: FileDescriptor, config: GeneratorConfig): string;
  render(file: FileDescriptor, plans: ReadonlyArray<ManagerPlan>, config: GeneratorConfig): string;
}

// ── Constants ──────────────────────────────────────────────

export const PLUGIN_NAME = 'protoc-gen-cache-manager';

export const DEFAULT_SUFFIX = 'Cache';

export const GENERATED_HEADER = `// Code generated by ${PLUGIN_NAME}. DO NOT EDIT.`;
