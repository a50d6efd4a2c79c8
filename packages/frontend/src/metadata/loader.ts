/**
 * Module image loader - Reads and validates dnpeek JSON module images.
 *
 * A module image is one JSON object per module file describing the module's
 * identity, its declared references, exported (forwarded) types and type
 * definitions. Validation is field by field; every problem found is reported
 * as a coded diagnostic rather than stopping at the first.
 */

import * as fs from "fs";
import * as path from "path";
import { error, ok, type Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import type {
  AttributeArgument,
  AttributeData,
  ExportedTypeMetadata,
  FieldMetadata,
  MemberAccess,
  MethodMetadata,
  ModuleMetadata,
  ModuleReference,
  ParameterMetadata,
  ParameterMode,
  TypeAccessibility,
  TypeKind,
  TypeMetadata,
  TypeSignature,
  Version,
} from "../types/metadata.js";
import { parseVersion } from "./version.js";
import { createModuleReference } from "./module-reference.js";
import { parseSignatureText } from "./signatures.js";

/**
 * Anything that can turn a module file into its metadata.
 */
export type ModuleReader = {
  readonly read: (filePath: string) => Result<ModuleMetadata, Diagnostic[]>;
};

type Json = Record<string, unknown>;

const isRecord = (value: unknown): value is Json =>
  typeof value === "object" && value !== null && !Array.isArray(value);

type Validation = {
  readonly file: string;
  readonly diagnostics: Diagnostic[];
};

const report = (
  validation: Validation,
  code: DiagnosticCode,
  message: string
): undefined => {
  validation.diagnostics.push({
    code,
    message,
    severity: "error",
    location: { file: validation.file },
  });
  return undefined;
};

const TYPE_KINDS: readonly TypeKind[] = [
  "class",
  "struct",
  "interface",
  "enum",
  "delegate",
];

const TYPE_ACCESSIBILITY: readonly TypeAccessibility[] = [
  "public",
  "internal",
  "nestedPublic",
  "nestedFamily",
  "nestedAssembly",
  "nestedFamilyOrAssembly",
  "nestedFamilyAndAssembly",
  "nestedPrivate",
];

const MEMBER_ACCESS: readonly MemberAccess[] = [
  "public",
  "family",
  "familyOrAssembly",
  "assembly",
  "familyAndAssembly",
  "private",
  "privateScope",
];

const PARAMETER_MODES: readonly ParameterMode[] = ["none", "ref", "out", "in"];

const oneOf = <T extends string>(
  allowed: readonly T[],
  value: unknown
): T | undefined => allowed.find((candidate) => candidate === value);

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const stringArray = (value: unknown): readonly string[] | undefined =>
  Array.isArray(value) && value.every((item) => typeof item === "string")
    ? value.filter((item): item is string => typeof item === "string")
    : undefined;

const readVersion = (value: unknown): Version | undefined =>
  typeof value === "string" ? parseVersion(value) : undefined;

const readReference = (
  data: unknown,
  validation: Validation,
  context: string
): ModuleReference | undefined => {
  if (!isRecord(data) || typeof data.name !== "string") {
    return report(validation, "DNP9007", `Invalid ${context}: 'name' must be a string`);
  }
  const version = readVersion(data.version);
  if (!version) {
    return report(
      validation,
      "DNP9007",
      `Invalid ${context}: 'version' must be a version string`
    );
  }
  return createModuleReference(data.name, version, {
    culture: optionalString(data.culture),
    publicKeyToken: optionalString(data.publicKeyToken),
    isRetargetable: data.isRetargetable === true,
    isWindowsRuntime: data.isWindowsRuntime === true,
  });
};

const readSignature = (
  data: unknown,
  validation: Validation,
  context: string
): TypeSignature | undefined => {
  if (typeof data === "string") {
    return (
      parseSignatureText(data) ??
      report(validation, "DNP9010", `Invalid type signature '${data}' in ${context}`)
    );
  }
  if (!isRecord(data)) {
    return report(validation, "DNP9010", `Invalid type signature in ${context}`);
  }

  const element = (): TypeSignature | undefined =>
    readSignature(data.elementType, validation, context);

  switch (data.kind) {
    case "named": {
      if (typeof data.name !== "string") {
        return report(validation, "DNP9010", `Invalid named type in ${context}: 'name' must be a string`);
      }
      const typeArguments: TypeSignature[] = [];
      if (Array.isArray(data.typeArguments)) {
        for (const argument of data.typeArguments) {
          const signature = readSignature(argument, validation, context);
          if (signature) typeArguments.push(signature);
        }
      }
      return {
        kind: "named",
        namespace: optionalString(data.namespace) ?? "",
        name: data.name,
        typeArguments: typeArguments.length > 0 ? typeArguments : undefined,
        isValueType: data.isValueType === true ? true : undefined,
      };
    }
    case "genericParameter": {
      if (typeof data.index !== "number" || data.index < 0) {
        return report(validation, "DNP9010", `Invalid generic parameter in ${context}: 'index' must be a non-negative number`);
      }
      return {
        kind: "genericParameter",
        owner: data.owner === "method" ? "method" : "type",
        index: data.index,
      };
    }
    case "byRef": {
      const elementType = element();
      return elementType && { kind: "byRef", elementType };
    }
    case "pointer": {
      const elementType = element();
      return elementType && { kind: "pointer", elementType };
    }
    case "pinned": {
      const elementType = element();
      return elementType && { kind: "pinned", elementType };
    }
    case "array": {
      const elementType = element();
      const rank = typeof data.rank === "number" && data.rank > 0 ? data.rank : 1;
      return elementType && { kind: "array", elementType, rank };
    }
    case "modified": {
      const elementType = element();
      if (typeof data.modifier !== "string") {
        return report(validation, "DNP9010", `Invalid modified type in ${context}: 'modifier' must be a string`);
      }
      return (
        elementType && {
          kind: "modified",
          modifier: data.modifier,
          isRequired: data.isRequired === true,
          elementType,
        }
      );
    }
    default:
      return report(
        validation,
        "DNP9010",
        `Invalid type signature in ${context}: unknown kind '${String(data.kind)}'`
      );
  }
};

const isAttributeArgument = (value: unknown): value is AttributeArgument =>
  value === null ||
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean" ||
  (Array.isArray(value) &&
    (value.every((item) => item === null || typeof item === "string") ||
      value.every((item) => typeof item === "boolean")));

const readAttributes = (
  data: unknown,
  validation: Validation,
  context: string
): readonly AttributeData[] => {
  if (data === undefined) return [];
  if (!Array.isArray(data)) {
    report(validation, "DNP9014", `Invalid attributes in ${context}: must be an array`);
    return [];
  }

  const attributes: AttributeData[] = [];
  for (const item of data) {
    if (typeof item === "string") {
      attributes.push({ type: item });
      continue;
    }
    if (!isRecord(item) || typeof item.type !== "string") {
      report(validation, "DNP9014", `Invalid attribute in ${context}: 'type' must be a string`);
      continue;
    }
    const raw = item.arguments;
    if (raw === undefined) {
      attributes.push({ type: item.type });
      continue;
    }
    if (!Array.isArray(raw) || !raw.every(isAttributeArgument)) {
      report(validation, "DNP9014", `Invalid attribute ${item.type} in ${context}: unsupported argument value`);
      continue;
    }
    attributes.push({ type: item.type, arguments: raw.filter(isAttributeArgument) });
  }
  return attributes;
};

const readParameter = (
  data: unknown,
  validation: Validation,
  context: string
): ParameterMetadata | undefined => {
  if (!isRecord(data) || typeof data.name !== "string") {
    return report(validation, "DNP9011", `Invalid parameter in ${context}: 'name' must be a string`);
  }
  const paramContext = `parameter ${data.name} of ${context}`;
  const type = readSignature(data.type, validation, paramContext);
  const mode = data.mode === undefined ? "none" : oneOf(PARAMETER_MODES, data.mode);
  if (!mode) {
    return report(validation, "DNP9011", `Invalid ${paramContext}: 'mode' must be one of ${PARAMETER_MODES.join(", ")}`);
  }
  return (
    type && {
      name: data.name,
      type,
      mode,
      attributes: readAttributes(data.attributes, validation, paramContext),
    }
  );
};

const readMethod = (
  data: unknown,
  validation: Validation,
  typeContext: string,
  index: number
): MethodMetadata | undefined => {
  if (!isRecord(data) || typeof data.name !== "string") {
    return report(validation, "DNP9011", `Invalid method ${index} of ${typeContext}: 'name' must be a string`);
  }
  const context = `method ${data.name} of ${typeContext}`;
  const access = data.access === undefined ? "public" : oneOf(MEMBER_ACCESS, data.access);
  if (!access) {
    return report(validation, "DNP9011", `Invalid ${context}: 'access' must be one of ${MEMBER_ACCESS.join(", ")}`);
  }

  const returnType =
    data.returnType === undefined
      ? parseSignatureText("System.Void")
      : readSignature(data.returnType, validation, context);

  const rawParameters = data.parameters ?? [];
  if (!Array.isArray(rawParameters)) {
    return report(validation, "DNP9011", `Invalid ${context}: 'parameters' must be an array`);
  }
  const parameters: ParameterMetadata[] = [];
  let parametersValid = true;
  for (const parameter of rawParameters) {
    const read = readParameter(parameter, validation, context);
    if (read) parameters.push(read);
    else parametersValid = false;
  }

  const isAbstract = data.isAbstract === true;
  if (!returnType || !parametersValid) return undefined;

  return {
    name: data.name,
    access,
    isStatic: data.isStatic === true,
    isAbstract,
    hasBody: typeof data.hasBody === "boolean" ? data.hasBody : !isAbstract,
    genericParameters: stringArray(data.genericParameters) ?? [],
    returnType,
    returnAttributes: readAttributes(data.returnAttributes, validation, context),
    parameters,
    attributes: readAttributes(data.attributes, validation, context),
    token: typeof data.token === "number" ? data.token : undefined,
  };
};

const readField = (
  data: unknown,
  validation: Validation,
  typeContext: string,
  index: number
): FieldMetadata | undefined => {
  if (!isRecord(data) || typeof data.name !== "string") {
    return report(validation, "DNP9012", `Invalid field ${index} of ${typeContext}: 'name' must be a string`);
  }
  const context = `field ${data.name} of ${typeContext}`;
  const access = data.access === undefined ? "public" : oneOf(MEMBER_ACCESS, data.access);
  if (!access) {
    return report(validation, "DNP9012", `Invalid ${context}: 'access' must be one of ${MEMBER_ACCESS.join(", ")}`);
  }
  const type = readSignature(data.type, validation, context);
  return (
    type && {
      name: data.name,
      access,
      type,
      isStatic: data.isStatic === true,
      attributes: readAttributes(data.attributes, validation, context),
    }
  );
};

const readType = (
  data: unknown,
  validation: Validation,
  index: number
): TypeMetadata | undefined => {
  const context = `type ${index} in ${path.basename(validation.file)}`;

  if (!isRecord(data)) {
    return report(validation, "DNP9009", `Invalid ${context}: must be an object`);
  }
  if (typeof data.name !== "string") {
    return report(validation, "DNP9009", `Invalid ${context}: missing or invalid 'name'`);
  }

  const kind = data.kind === undefined ? "class" : oneOf(TYPE_KINDS, data.kind);
  if (!kind) {
    return report(validation, "DNP9009", `Invalid ${context}: 'kind' must be one of ${TYPE_KINDS.join(", ")}`);
  }
  const accessibility =
    data.accessibility === undefined
      ? "public"
      : oneOf(TYPE_ACCESSIBILITY, data.accessibility);
  if (!accessibility) {
    return report(validation, "DNP9009", `Invalid ${context}: 'accessibility' must be one of ${TYPE_ACCESSIBILITY.join(", ")}`);
  }

  for (const field of ["fields", "methods"]) {
    if (data[field] !== undefined && !Array.isArray(data[field])) {
      return report(validation, "DNP9009", `Invalid ${context}: '${field}' must be an array`);
    }
  }

  const typeContext = `type ${data.name}`;
  const before = validation.diagnostics.length;
  const baseType =
    data.baseType === undefined || data.baseType === null
      ? undefined
      : readSignature(data.baseType, validation, typeContext);

  const fields: FieldMetadata[] = [];
  const rawFields: unknown[] = Array.isArray(data.fields) ? data.fields : [];
  rawFields.forEach((field, fieldIndex) => {
    const read = readField(field, validation, typeContext, fieldIndex);
    if (read) fields.push(read);
  });

  const methods: MethodMetadata[] = [];
  const rawMethods: unknown[] = Array.isArray(data.methods) ? data.methods : [];
  rawMethods.forEach((method, methodIndex) => {
    const read = readMethod(method, validation, typeContext, methodIndex);
    if (read) methods.push(read);
  });

  const attributes = readAttributes(data.attributes, validation, typeContext);
  if (validation.diagnostics.length > before) return undefined;

  return {
    namespace: optionalString(data.namespace) ?? "",
    name: data.name,
    kind,
    accessibility,
    baseType,
    genericParameters: stringArray(data.genericParameters) ?? [],
    fields,
    methods,
    attributes,
  };
};

const readExportedType = (
  data: unknown,
  validation: Validation,
  references: readonly ModuleReference[],
  index: number
): ExportedTypeMetadata | undefined => {
  const context = `exported type ${index}`;
  if (!isRecord(data) || typeof data.name !== "string") {
    return report(validation, "DNP9013", `Invalid ${context}: 'name' must be a string`);
  }

  const namespace = optionalString(data.namespace) ?? "";
  if (data.forwardedTo === undefined) {
    return { namespace, name: data.name };
  }

  // Forwarder scope: an index into 'references' or an inline reference
  if (typeof data.forwardedTo === "number") {
    const target = references[data.forwardedTo];
    if (!target) {
      return report(validation, "DNP9013", `Invalid ${context}: 'forwardedTo' index ${data.forwardedTo} is out of range`);
    }
    return { namespace, name: data.name, forwardedTo: target };
  }

  const target = readReference(data.forwardedTo, validation, `forwarder scope of ${context}`);
  return target && { namespace, name: data.name, forwardedTo: target };
};

/**
 * Validate parsed JSON as a module image.
 */
export const parseModuleImage = (
  data: unknown,
  filePath: string
): Result<ModuleMetadata, Diagnostic[]> => {
  const validation: Validation = { file: filePath, diagnostics: [] };
  const fileName = path.basename(filePath);

  if (!isRecord(data)) {
    report(validation, "DNP9004", `Module image must be an object, got ${Array.isArray(data) ? "array" : typeof data}`);
    return error(validation.diagnostics);
  }

  if (typeof data.name !== "string" || data.name.length === 0) {
    report(validation, "DNP9005", `Missing or invalid 'name' field in ${fileName}`);
  }

  const version = readVersion(data.version);
  if (!version) {
    report(validation, "DNP9006", `Missing or invalid 'version' field in ${fileName}`);
  }

  const references: ModuleReference[] = [];
  const rawReferences = data.references ?? [];
  if (!Array.isArray(rawReferences)) {
    report(validation, "DNP9007", `'references' must be an array in ${fileName}`);
  } else {
    rawReferences.forEach((reference: unknown, index: number) => {
      const read = readReference(reference, validation, `reference ${index} in ${fileName}`);
      if (read) references.push(read);
    });
  }

  const exportedTypes: ExportedTypeMetadata[] = [];
  if (Array.isArray(data.exportedTypes)) {
    data.exportedTypes.forEach((exported: unknown, index: number) => {
      const read = readExportedType(exported, validation, references, index);
      if (read) exportedTypes.push(read);
    });
  } else if (data.exportedTypes !== undefined) {
    report(validation, "DNP9013", `'exportedTypes' must be an array in ${fileName}`);
  }

  const types: TypeMetadata[] = [];
  if (!Array.isArray(data.types)) {
    report(validation, "DNP9008", `Missing or invalid 'types' field in ${fileName}`);
  } else {
    data.types.forEach((type: unknown, index: number) => {
      const read = readType(type, validation, index);
      if (read) types.push(read);
    });
  }

  if (validation.diagnostics.length > 0 || typeof data.name !== "string" || !version) {
    return error(validation.diagnostics);
  }

  return ok({
    name: data.name,
    version,
    culture: optionalString(data.culture),
    publicKey: optionalString(data.publicKey),
    publicKeyToken: optionalString(data.publicKeyToken)?.toLowerCase(),
    runtimeVersion: optionalString(data.runtimeVersion),
    targetFramework: optionalString(data.targetFramework),
    internalsVisibleTo: stringArray(data.internalsVisibleTo) ?? [],
    references,
    exportedTypes,
    types,
  });
};

/**
 * Load and validate a module image file.
 */
export const loadModuleImage = (
  filePath: string
): Result<ModuleMetadata, Diagnostic[]> => {
  const location = { file: filePath };

  if (!fs.existsSync(filePath)) {
    return error([
      {
        code: "DNP9001",
        message: `Module image not found: ${filePath}`,
        severity: "error",
        location,
      },
    ]);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (cause) {
    return error([
      {
        code: "DNP9002",
        message: `Failed to read module image: ${cause}`,
        severity: "error",
        location,
      },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (cause) {
    return error([
      {
        code: "DNP9003",
        message: `Invalid JSON in module image: ${cause}`,
        severity: "error",
        location,
        hint: "Module files are read as dnpeek JSON module images",
      },
    ]);
  }

  return parseModuleImage(parsed, filePath);
};

export const jsonModuleReader: ModuleReader = {
  read: loadModuleImage,
};
