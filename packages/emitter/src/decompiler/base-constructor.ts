/**
 * Base constructor selection for synthesized constructor bodies
 *
 * A stub constructor must chain to some base constructor. Candidates are
 * the instance constructors of the resolved base type, ranked by how
 * reachable they are from the declaring module, then by whether they take
 * by-ref parameters, then by parameter count. Ties keep declaration order.
 */

import {
  removePinnedAndModifiers,
  substituteGenericArguments,
  type MemberAccess,
  type MethodDefinition,
  type ParameterDefinition,
  type TypeDefinition,
  type TypeSignature,
  type TypeSystemClosure,
  type TypeSystemModule,
} from "@dnpeek/frontend";

export type BaseConstructorChoice = {
  readonly baseType: TypeDefinition;
  readonly constructor: MethodDefinition;
  /** Parameter types with the base type's generic arguments substituted */
  readonly parameterTypes: readonly TypeSignature[];
};

/** Lower is more accessible */
export const accessRank = (access: MemberAccess, sameModuleOrFriend: boolean): number => {
  switch (access) {
    case "public":
    case "family":
    case "familyOrAssembly":
      return 0;
    case "assembly":
    case "familyAndAssembly":
      return sameModuleOrFriend ? 0 : 1;
    case "private":
      return 2;
    case "privateScope":
      return 3;
  }
};

const takesByRef = (parameter: ParameterDefinition): boolean =>
  parameter.mode !== "none" || removePinnedAndModifiers(parameter.type).kind === "byRef";

const byRefPenalty = (method: MethodDefinition): number =>
  method.parameters.some(takesByRef) ? 1 : 0;

const typeArgumentsOf = (signature: TypeSignature): readonly TypeSignature[] => {
  const stripped = removePinnedAndModifiers(signature);
  return stripped.kind === "named" ? stripped.typeArguments ?? [] : [];
};

/**
 * Pick the base constructor a stub of `declaringType`'s constructor calls.
 * Undefined when the type has no base type, the base type does not resolve
 * or it declares no instance constructor.
 */
export const selectBaseConstructor = (
  declaringType: TypeDefinition,
  typeSystem: TypeSystemClosure,
  callerModule: TypeSystemModule
): BaseConstructorChoice | undefined => {
  const baseSignature = declaringType.baseType;
  if (!baseSignature) return undefined;
  const baseType = typeSystem.resolveTypeDefinition(baseSignature);
  if (!baseType) return undefined;

  const baseModule = typeSystem.findTypeModule(baseType.fullName);
  const sameModuleOrFriend =
    baseModule !== undefined &&
    (baseModule === callerModule || typeSystem.isFriendModule(callerModule, baseModule));

  const ranked = baseType.methods
    .filter((method) => method.name === ".ctor" && !method.isStatic)
    .map((method, order) => ({
      method,
      order,
      key: [accessRank(method.access, sameModuleOrFriend), byRefPenalty(method), method.parameters.length],
    }))
    .sort((a, b) => {
      for (let i = 0; i < a.key.length; i++) {
        const diff = (a.key[i] ?? 0) - (b.key[i] ?? 0);
        if (diff !== 0) return diff;
      }
      return a.order - b.order;
    });

  const best = ranked[0];
  if (!best) return undefined;

  const typeArguments = typeArgumentsOf(baseSignature);
  return {
    baseType,
    constructor: best.method,
    parameterTypes: best.method.parameters.map((parameter) =>
      substituteGenericArguments(parameter.type, typeArguments)
    ),
  };
};
