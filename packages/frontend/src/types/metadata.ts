/**
 * Module metadata model
 *
 * The shape of a module image as produced by the metadata reader: identity,
 * declared references, exported (forwarded) types and type definitions.
 * All values are immutable once read.
 */

export type Version = {
  readonly major: number;
  readonly minor: number;
  readonly build?: number;
  readonly revision?: number;
};

export type ModuleReference = {
  readonly name: string;
  readonly version: Version;
  readonly culture?: string;
  /** Lower-case hex public key token, absent for unsigned modules */
  readonly publicKeyToken?: string;
  readonly isRetargetable: boolean;
  /** ContentType=WindowsRuntime */
  readonly isWindowsRuntime: boolean;
};

export type AttributeArgument =
  | string
  | number
  | boolean
  | null
  | readonly (string | null)[]
  | readonly boolean[];

export type AttributeData = {
  /** Full name of the attribute type, e.g. "System.Runtime.CompilerServices.ExtensionAttribute" */
  readonly type: string;
  readonly arguments?: readonly AttributeArgument[];
};

export type NamedTypeSignature = {
  readonly kind: "named";
  readonly namespace: string;
  readonly name: string;
  readonly typeArguments?: readonly TypeSignature[];
  readonly isValueType?: boolean;
};

export type GenericParameterSignature = {
  readonly kind: "genericParameter";
  readonly owner: "type" | "method";
  readonly index: number;
  /** Filled in when resolved against a generic context */
  readonly name?: string;
};

export type TupleElement = {
  readonly type: TypeSignature;
  readonly name?: string;
};

export type TypeSignature =
  | NamedTypeSignature
  | GenericParameterSignature
  | { readonly kind: "byRef"; readonly elementType: TypeSignature }
  | {
      readonly kind: "array";
      readonly elementType: TypeSignature;
      readonly rank: number;
    }
  | { readonly kind: "pointer"; readonly elementType: TypeSignature }
  | { readonly kind: "pinned"; readonly elementType: TypeSignature }
  | {
      readonly kind: "modified";
      readonly modifier: string;
      readonly isRequired: boolean;
      readonly elementType: TypeSignature;
    }
  // Type-system-level representations (never read from an image)
  | { readonly kind: "dynamic" }
  | { readonly kind: "tuple"; readonly elements: readonly TupleElement[] };

export type TypeKind = "class" | "struct" | "interface" | "enum" | "delegate";

export type TypeAccessibility =
  | "public"
  | "internal"
  | "nestedPublic"
  | "nestedFamily"
  | "nestedAssembly"
  | "nestedFamilyOrAssembly"
  | "nestedFamilyAndAssembly"
  | "nestedPrivate";

/** Member access as encoded in method/field attributes */
export type MemberAccess =
  | "public"
  | "family"
  | "familyOrAssembly"
  | "assembly"
  | "familyAndAssembly"
  | "private"
  | "privateScope";

export type ParameterMode = "none" | "ref" | "out" | "in";

export type ParameterMetadata = {
  readonly name: string;
  readonly type: TypeSignature;
  readonly mode: ParameterMode;
  readonly attributes: readonly AttributeData[];
};

export type MethodMetadata = {
  readonly name: string;
  readonly access: MemberAccess;
  readonly isStatic: boolean;
  readonly isAbstract: boolean;
  /** False for abstract, extern and runtime-implemented methods */
  readonly hasBody: boolean;
  readonly genericParameters: readonly string[];
  readonly returnType: TypeSignature;
  readonly returnAttributes: readonly AttributeData[];
  readonly parameters: readonly ParameterMetadata[];
  readonly attributes: readonly AttributeData[];
  readonly token?: number;
};

export type FieldMetadata = {
  readonly name: string;
  readonly access: MemberAccess;
  readonly type: TypeSignature;
  readonly isStatic: boolean;
  readonly attributes: readonly AttributeData[];
};

export type TypeMetadata = {
  readonly namespace: string;
  readonly name: string;
  readonly kind: TypeKind;
  readonly accessibility: TypeAccessibility;
  readonly baseType?: TypeSignature;
  readonly genericParameters: readonly string[];
  readonly fields: readonly FieldMetadata[];
  readonly methods: readonly MethodMetadata[];
  readonly attributes: readonly AttributeData[];
};

export type ExportedTypeMetadata = {
  readonly namespace: string;
  readonly name: string;
  /** Present when the entry is a forwarder whose scope is another module */
  readonly forwardedTo?: ModuleReference;
};

export type ModuleMetadata = {
  readonly name: string;
  readonly version: Version;
  readonly culture?: string;
  /** Full public key (hex); the token is derived from it */
  readonly publicKey?: string;
  readonly publicKeyToken?: string;
  /** Metadata runtime version string, e.g. "v4.0.30319" */
  readonly runtimeVersion?: string;
  /** Value of the module's declared target framework attribute */
  readonly targetFramework?: string;
  /** Names of modules granted internals access */
  readonly internalsVisibleTo: readonly string[];
  readonly references: readonly ModuleReference[];
  readonly exportedTypes: readonly ExportedTypeMetadata[];
  readonly types: readonly TypeMetadata[];
};
