/**
 * Well-known types every closure must be able to name
 */

import type { TypeKind } from "../types/metadata.js";

export type KnownType = {
  readonly namespace: string;
  readonly name: string;
  readonly kind: TypeKind;
  /** Name of the base type in System, absent for Object */
  readonly baseType?: string;
};

const struct = (name: string): KnownType => ({
  namespace: "System",
  name,
  kind: "struct",
  baseType: "ValueType",
});

const klass = (name: string, baseType = "Object"): KnownType => ({
  namespace: "System",
  name,
  kind: "class",
  baseType,
});

export const REQUIRED_KNOWN_TYPES: readonly KnownType[] = [
  { namespace: "System", name: "Object", kind: "class" },
  klass("ValueType"),
  struct("Void"),
  struct("Boolean"),
  struct("Char"),
  struct("SByte"),
  struct("Byte"),
  struct("Int16"),
  struct("UInt16"),
  struct("Int32"),
  struct("UInt32"),
  struct("Int64"),
  struct("UInt64"),
  struct("Single"),
  struct("Double"),
  struct("Decimal"),
  klass("String"),
  struct("IntPtr"),
  struct("UIntPtr"),
  struct("TypedReference"),
  klass("Enum", "ValueType"),
  klass("Array"),
  klass("Delegate"),
  klass("MulticastDelegate", "Delegate"),
  klass("Exception"),
  klass("Attribute"),
  klass("Type"),
  klass("NullReferenceException", "Exception"),
];

export const knownTypeFullName = (type: KnownType): string =>
  `${type.namespace}.${type.name}`;
