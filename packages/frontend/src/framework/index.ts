/**
 * Framework identification - Public API
 */

export {
  identifyTargetFramework,
  detectTargetFrameworkMoniker,
} from "./identify.js";

export {
  parseTargetFramework,
  formatTargetFramework,
  isUnknownTargetFramework,
  hasSpecificVersion,
  unknownTargetFramework,
} from "./target-framework.js";
export type {
  TargetFrameworkFamily,
  TargetFrameworkIdentity,
} from "./target-framework.js";
