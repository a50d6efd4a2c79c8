/**
 * Target framework identities and their moniker text form
 * (".NETCoreApp,Version=v8.0,Profile=Client")
 */

import type { Version } from "../types/metadata.js";
import {
  formatVersion,
  isZeroOrAllOnes,
  parseVersion,
  versionsEqual,
  zeroVersion,
} from "../metadata/version.js";

export type TargetFrameworkFamily =
  | "NETFramework"
  | "NETStandard"
  | "NETCoreApp"
  | "NET"
  | "Silverlight";

export type TargetFrameworkIdentity = {
  readonly family: TargetFrameworkFamily;
  readonly version: Version;
  readonly profile?: string;
};

export const unknownTargetFramework: TargetFrameworkIdentity = {
  family: "NETFramework",
  version: zeroVersion,
};

export const isUnknownTargetFramework = (
  identity: TargetFrameworkIdentity
): boolean =>
  identity.family === "NETFramework" &&
  identity.profile === undefined &&
  versionsEqual(identity.version, zeroVersion);

/** True unless the version is absent, zero or all-ones */
export const hasSpecificVersion = (identity: TargetFrameworkIdentity): boolean =>
  !isZeroOrAllOnes(identity.version);

const familyFromMoniker = (text: string): TargetFrameworkFamily => {
  switch (text.trim().toUpperCase()) {
    case ".NETCOREAPP":
      return "NETCoreApp";
    case ".NETSTANDARD":
      return "NETStandard";
    case "SILVERLIGHT":
      return "Silverlight";
    default:
      return "NETFramework";
  }
};

const MONIKER_NAMES: Record<TargetFrameworkFamily, string> = {
  NETFramework: ".NETFramework",
  NETStandard: ".NETStandard",
  NETCoreApp: ".NETCoreApp",
  // .NET 5+ still declares itself as .NETCoreApp
  NET: ".NETCoreApp",
  Silverlight: "Silverlight",
};

/**
 * Parse a target framework moniker. Never fails: unrecognised families map
 * to NETFramework and unparseable versions to the zero version.
 */
export const parseTargetFramework = (
  moniker: string
): TargetFrameworkIdentity => {
  const [head = "", ...pairs] = moniker.split(",");
  let family = familyFromMoniker(head);
  let version: Version | undefined;
  let profile: string | undefined;

  for (const pair of pairs) {
    const parts = pair.trim().split("=");
    if (parts.length !== 2) continue;
    const key = (parts[0] ?? "").trim().toUpperCase();
    const value = (parts[1] ?? "").trim();

    if (key === "VERSION") {
      let text = value.replace(/^[v\s]+/, "");
      if (
        (family === "NETCoreApp" || family === "NETStandard") &&
        text.split(".").length === 2
      ) {
        text += ".0";
      }
      version = /^\d+(\.\d+){1,3}$/.test(text) ? parseVersion(text) : undefined;
      if (version && version.major >= 5 && family === "NETCoreApp") {
        family = "NET";
      }
    } else if (key === "PROFILE" && value.length > 0) {
      profile = value;
    }
  }

  return { family, version: version ?? zeroVersion, profile };
};

export const formatTargetFramework = (
  identity: TargetFrameworkIdentity
): string => {
  const base = `${MONIKER_NAMES[identity.family]},Version=v${formatVersion(identity.version)}`;
  return identity.profile ? `${base},Profile=${identity.profile}` : base;
};
