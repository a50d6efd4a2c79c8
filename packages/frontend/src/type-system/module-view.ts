/**
 * Type-system views over one module's metadata
 *
 * A TypeSystemModule wraps the raw metadata of a module and hands out
 * definition views with the type system options applied: attribute-encoded
 * `dynamic` and tuple types, extension method flags, decimal constants and
 * the public-API filter. An attribute an option folds into the view is
 * dropped from the view's attribute list. Views are cached per module unless
 * the options ask for fresh ones.
 */

import type {
  AttributeData,
  FieldMetadata,
  MemberAccess,
  MethodMetadata,
  ModuleMetadata,
  ModuleReference,
  ParameterMode,
  TypeAccessibility,
  TypeKind,
  TypeMetadata,
  TypeSignature,
} from "../types/metadata.js";
import { qualifiedName } from "../metadata/signatures.js";
import { moduleIdentity } from "../metadata/module-reference.js";
import { hasOption, TypeSystemOptions } from "./options.js";
import {
  applyAttributeTypes,
  DECIMAL_CONSTANT_ATTRIBUTE,
  decimalConstantValue,
  DYNAMIC_ATTRIBUTE,
  EXTENSION_ATTRIBUTE,
  hasAttribute,
  TUPLE_ELEMENT_NAMES_ATTRIBUTE,
  withoutAttributes,
  type AttributeTypeOptions,
} from "./attribute-types.js";

export type ParameterDefinition = {
  readonly name: string;
  readonly index: number;
  readonly type: TypeSignature;
  readonly mode: ParameterMode;
  readonly attributes: readonly AttributeData[];
};

export type MethodDefinition = {
  readonly name: string;
  readonly access: MemberAccess;
  readonly isStatic: boolean;
  readonly isAbstract: boolean;
  readonly hasBody: boolean;
  readonly isConstructor: boolean;
  readonly isExtensionMethod: boolean;
  readonly genericParameters: readonly string[];
  readonly returnType: TypeSignature;
  readonly parameters: readonly ParameterDefinition[];
  readonly attributes: readonly AttributeData[];
  readonly token?: number;
};

export type FieldDefinition = {
  readonly name: string;
  readonly access: MemberAccess;
  readonly isStatic: boolean;
  readonly type: TypeSignature;
  /** Decimal literal text of a DecimalConstantAttribute field */
  readonly decimalConstant?: string;
  readonly attributes: readonly AttributeData[];
};

export type TypeDefinition = {
  readonly namespace: string;
  readonly name: string;
  readonly fullName: string;
  readonly kind: TypeKind;
  readonly accessibility: TypeAccessibility;
  readonly isValueType: boolean;
  readonly baseType?: TypeSignature;
  readonly genericParameters: readonly string[];
  readonly fields: readonly FieldDefinition[];
  readonly methods: readonly MethodDefinition[];
  readonly hasExtensionMethods: boolean;
  readonly attributes: readonly AttributeData[];
  /** Name of the owning module */
  readonly moduleName: string;
};

export type TypeSystemModuleInit = {
  readonly metadata: ModuleMetadata;
  readonly filePath?: string;
  readonly options: TypeSystemOptions;
  readonly isMainModule?: boolean;
  readonly isSynthetic?: boolean;
};

const NO_ATTRIBUTES: ReadonlySet<string> = new Set<string>();
const EXTENSION_MARKER: ReadonlySet<string> = new Set([EXTENSION_ATTRIBUTE]);
const DECIMAL_CONSTANT_MARKER: ReadonlySet<string> = new Set([DECIMAL_CONSTANT_ATTRIBUTE]);

const PUBLIC_TYPE_ACCESS: ReadonlySet<TypeAccessibility> = new Set<TypeAccessibility>([
  "public",
  "nestedPublic",
  "nestedFamily",
  "nestedFamilyOrAssembly",
]);

const PUBLIC_MEMBER_ACCESS: ReadonlySet<MemberAccess> = new Set<MemberAccess>([
  "public",
  "family",
  "familyOrAssembly",
]);

/** Module name part of an InternalsVisibleTo value ("Name, PublicKey=...") */
const friendName = (value: string): string =>
  (value.split(",", 1)[0] ?? "").trim().toLowerCase();

export class TypeSystemModule {
  readonly name: string;
  readonly metadata: ModuleMetadata;
  readonly filePath: string | undefined;
  readonly options: TypeSystemOptions;
  readonly isMainModule: boolean;
  readonly isSynthetic: boolean;
  readonly reference: ModuleReference;

  private readonly typeCache = new Map<string, TypeDefinition>();
  private readonly typesByName: ReadonlyMap<string, TypeMetadata>;
  private readonly attributeTypes: AttributeTypeOptions;
  /** Signature attributes folded into types under the current options */
  private readonly signatureMarkers: ReadonlySet<string>;

  constructor(init: TypeSystemModuleInit) {
    this.metadata = init.metadata;
    this.name = init.metadata.name;
    this.filePath = init.filePath;
    this.options = init.options;
    this.isMainModule = init.isMainModule ?? false;
    this.isSynthetic = init.isSynthetic ?? false;
    this.reference = moduleIdentity(init.metadata);
    this.attributeTypes = {
      dynamic: hasOption(init.options, TypeSystemOptions.Dynamic),
      tuples: hasOption(init.options, TypeSystemOptions.Tuple),
    };
    const markers: string[] = [];
    if (this.attributeTypes.dynamic) markers.push(DYNAMIC_ATTRIBUTE);
    if (this.attributeTypes.tuples) markers.push(TUPLE_ELEMENT_NAMES_ATTRIBUTE);
    this.signatureMarkers = new Set(markers);
    this.typesByName = new Map(
      init.metadata.types.map(
        (type) => [qualifiedName(type.namespace, type.name), type] as const
      )
    );
  }

  private get onlyPublicApi(): boolean {
    return hasOption(this.options, TypeSystemOptions.OnlyPublicAPI);
  }

  /** Type definitions visible under the current options, in metadata order */
  get typeDefinitions(): readonly TypeDefinition[] {
    return this.metadata.types
      .filter((type) => this.isVisible(type))
      .map((type) => this.definitionFor(type));
  }

  getTypeDefinition(namespace: string, name: string): TypeDefinition | undefined {
    return this.findTypeDefinition(qualifiedName(namespace, name));
  }

  findTypeDefinition(fullName: string): TypeDefinition | undefined {
    const type = this.typesByName.get(fullName);
    return type && this.isVisible(type) ? this.definitionFor(type) : undefined;
  }

  /** True when the raw metadata declares the type, regardless of options */
  declaresType(fullName: string): boolean {
    return this.typesByName.has(fullName);
  }

  /** True when this module grants `other` access to its internals */
  internalsVisibleTo(other: TypeSystemModule): boolean {
    if (other === this) return true;
    const otherName = other.name.toLowerCase();
    return this.metadata.internalsVisibleTo.some((value) => friendName(value) === otherName);
  }

  private isVisible(type: TypeMetadata): boolean {
    return !this.onlyPublicApi || PUBLIC_TYPE_ACCESS.has(type.accessibility);
  }

  private isMemberVisible(access: MemberAccess): boolean {
    return !this.onlyPublicApi || PUBLIC_MEMBER_ACCESS.has(access);
  }

  private definitionFor(type: TypeMetadata): TypeDefinition {
    if (hasOption(this.options, TypeSystemOptions.Uncached)) {
      return this.buildType(type);
    }
    const key = qualifiedName(type.namespace, type.name);
    const cached = this.typeCache.get(key);
    if (cached) return cached;
    const definition = this.buildType(type);
    this.typeCache.set(key, definition);
    return definition;
  }

  private buildType(type: TypeMetadata): TypeDefinition {
    const methods = type.methods
      .filter((method) => this.isMemberVisible(method.access))
      .map((method) => this.buildMethod(method));
    const fields = type.fields
      .filter((field) => this.isMemberVisible(field.access))
      .map((field) => this.buildField(field));
    const hasExtensionMethods = methods.some((method) => method.isExtensionMethod);

    return {
      namespace: type.namespace,
      name: type.name,
      fullName: qualifiedName(type.namespace, type.name),
      kind: type.kind,
      accessibility: type.accessibility,
      isValueType: type.kind === "struct" || type.kind === "enum",
      baseType: type.baseType,
      genericParameters: type.genericParameters,
      fields,
      methods,
      hasExtensionMethods,
      attributes: withoutAttributes(
        type.attributes,
        hasExtensionMethods ? EXTENSION_MARKER : NO_ATTRIBUTES
      ),
      moduleName: this.name,
    };
  }

  private buildMethod(method: MethodMetadata): MethodDefinition {
    const isExtensionMethod =
      hasOption(this.options, TypeSystemOptions.ExtensionMethods) &&
      method.isStatic &&
      method.parameters.length > 0 &&
      hasAttribute(method.attributes, EXTENSION_ATTRIBUTE);

    return {
      name: method.name,
      access: method.access,
      isStatic: method.isStatic,
      isAbstract: method.isAbstract,
      hasBody: method.hasBody,
      isConstructor: method.name === ".ctor" || method.name === ".cctor",
      isExtensionMethod,
      genericParameters: method.genericParameters,
      returnType: applyAttributeTypes(method.returnType, method.returnAttributes, this.attributeTypes),
      parameters: method.parameters.map((parameter, index) => ({
        name: parameter.name,
        index,
        type: applyAttributeTypes(parameter.type, parameter.attributes, this.attributeTypes),
        mode: parameter.mode,
        attributes: withoutAttributes(parameter.attributes, this.signatureMarkers),
      })),
      attributes: withoutAttributes(
        method.attributes,
        isExtensionMethod ? EXTENSION_MARKER : NO_ATTRIBUTES
      ),
      token: method.token,
    };
  }

  private buildField(field: FieldMetadata): FieldDefinition {
    const decimalConstant = hasOption(this.options, TypeSystemOptions.DecimalConstants)
      ? decimalConstantValue(field.attributes)
      : undefined;

    return {
      name: field.name,
      access: field.access,
      isStatic: field.isStatic,
      type: applyAttributeTypes(field.type, field.attributes, this.attributeTypes),
      decimalConstant,
      attributes: withoutAttributes(
        withoutAttributes(field.attributes, this.signatureMarkers),
        decimalConstant === undefined ? NO_ATTRIBUTES : DECIMAL_CONSTANT_MARKER
      ),
    };
  }
}
