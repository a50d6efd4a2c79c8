/**
 * dnpeek framework command - print a module's target framework
 */

import * as path from "node:path";
import {
  formatTargetFramework,
  identifyTargetFramework,
  isUnknownTargetFramework,
  jsonModuleReader,
  error,
  ok,
  type Result,
} from "@dnpeek/frontend";
import type { CommandError, CommandOutput } from "../types.js";
import { unreadable } from "./common.js";

export const UNKNOWN_FRAMEWORK = "unknown";

export const frameworkCommand = (modulePath: string): Result<CommandOutput, CommandError> => {
  const absolutePath = path.resolve(modulePath);
  const read = jsonModuleReader.read(absolutePath);
  if (!read.ok) {
    return error(unreadable(modulePath, read.error));
  }

  const identity = identifyTargetFramework(read.value, absolutePath);
  return ok({
    lines: [isUnknownTargetFramework(identity) ? UNKNOWN_FRAMEWORK : formatTargetFramework(identity)],
    diagnostics: [],
  });
};
