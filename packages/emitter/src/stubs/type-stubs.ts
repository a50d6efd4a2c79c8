/**
 * Stub compilation units
 *
 * Renders the types of a module as C# skeletons whose method bodies are
 * synthesized empty bodies. Abstract and interface methods keep bodiless
 * declarations. Delegates are not rendered.
 */

import {
  createGenericContext,
  isNamedType,
  resolveInGenericContext,
  type Diagnostic,
  type TypeAccessibility,
  type TypeDefinition,
  type TypeSignature,
  type TypeSystemClosure,
  type TypeSystemModule,
} from "@dnpeek/frontend";
import type {
  CompilationUnitSyntax,
  MemberDeclarationSyntax,
  NamespaceDeclarationSyntax,
  TypeDeclarationSyntax,
  TypeSyntax,
} from "../syntax/types.js";
import { stripArity, typeSyntaxFromSignature } from "../syntax/type-factories.js";
import { createMethodDeclaration } from "../decompiler/declarations.js";
import { decompileEmptyBody } from "../decompiler/empty-body.js";
import { methodHandlesOf } from "../decompiler/method-handle.js";

export type StubOptions = {
  /** Render only the type with this full name */
  readonly typeName?: string;
};

export type StubResult = {
  readonly unit: CompilationUnitSyntax;
  readonly diagnostics: readonly Diagnostic[];
};

const TYPE_MODIFIERS: Readonly<Record<TypeAccessibility, readonly string[]>> = {
  public: ["public"],
  internal: ["internal"],
  nestedPublic: ["public"],
  nestedFamily: ["protected"],
  nestedAssembly: ["internal"],
  nestedFamilyOrAssembly: ["protected", "internal"],
  nestedFamilyAndAssembly: ["private", "protected"],
  nestedPrivate: ["private"],
};

/** Base types C# spells through the type's keyword instead */
const isImplicitBase = (signature: TypeSignature): boolean =>
  isNamedType(signature, "System", "Object") ||
  isNamedType(signature, "System", "ValueType") ||
  isNamedType(signature, "System", "Enum");

const baseTypesOf = (type: TypeDefinition): readonly TypeSyntax[] => {
  if (!type.baseType || isImplicitBase(type.baseType) || type.kind !== "class") return [];
  return [typeSyntaxFromSignature(resolveInGenericContext(type.baseType, createGenericContext(type)))];
};

const stubMembers = (
  module: TypeSystemModule,
  type: TypeDefinition,
  typeSystem: TypeSystemClosure,
  diagnostics: Diagnostic[]
): readonly MemberDeclarationSyntax[] =>
  methodHandlesOf(module, type).map((handle) => {
    const declaration = createMethodDeclaration(handle);
    if (handle.method.isAbstract || type.kind === "interface") return declaration;
    const { body, diagnostics: stubDiagnostics } = decompileEmptyBody(handle, typeSystem, declaration);
    diagnostics.push(...stubDiagnostics);
    return { ...declaration, body };
  });

const stubType = (
  module: TypeSystemModule,
  type: TypeDefinition,
  typeSystem: TypeSystemClosure,
  diagnostics: Diagnostic[]
): TypeDeclarationSyntax | undefined => {
  if (type.kind === "delegate") return undefined;
  return {
    kind: "typeDeclaration",
    keyword: type.kind,
    modifiers: TYPE_MODIFIERS[type.accessibility],
    name: stripArity(type.name),
    typeParameters: type.genericParameters,
    baseTypes: baseTypesOf(type),
    members: type.kind === "enum" ? [] : stubMembers(module, type, typeSystem, diagnostics),
  };
};

/**
 * Stubs for the main module's types, grouped by namespace in first-seen
 * order. Undefined when `typeName` names no type of the main module.
 */
export const createStubCompilationUnit = (
  typeSystem: TypeSystemClosure,
  options: StubOptions = {}
): StubResult | undefined => {
  const module = typeSystem.mainModule;
  const types = options.typeName
    ? [module.findTypeDefinition(options.typeName)].flatMap((type) => (type ? [type] : []))
    : module.typeDefinitions;
  if (options.typeName && types.length === 0) return undefined;

  const diagnostics: Diagnostic[] = [];
  const globalTypes: TypeDeclarationSyntax[] = [];
  const namespaces = new Map<string, TypeDeclarationSyntax[]>();

  for (const type of types) {
    const declaration = stubType(module, type, typeSystem, diagnostics);
    if (!declaration) continue;
    if (type.namespace.length === 0) {
      globalTypes.push(declaration);
      continue;
    }
    const members = namespaces.get(type.namespace) ?? [];
    members.push(declaration);
    namespaces.set(type.namespace, members);
  }

  const namespaceDeclarations: NamespaceDeclarationSyntax[] = [...namespaces].map(([name, members]) => ({
    kind: "namespaceDeclaration",
    name,
    members,
  }));

  return {
    unit: {
      kind: "compilationUnit",
      headerText: `// ${module.name}`,
      members: [...globalTypes, ...namespaceDeclarations],
    },
    diagnostics,
  };
};
