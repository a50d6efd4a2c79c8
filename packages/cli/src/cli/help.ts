/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
dnpeek - .NET module inspector and stub decompiler v${VERSION}

USAGE:
  dnpeek <command> [options]

COMMANDS:
  framework <module>              Print the module's target framework
  resolve <module> <reference>    Print the file a reference resolves to
  references <module>             List the modules of the assembled type system
  stubs <module>                  Print C# stubs with synthesized method bodies

GLOBAL OPTIONS:
  -h, --help                      Show help
  -v, --version                   Show version
  -V, --verbose                   Verbose output
  -q, --quiet                     Suppress warnings
  -c, --config <file>             Config file path (default: dnpeek.json)

RESOLUTION OPTIONS:
  -L, --lib <dir>                 Extra search directory (repeatable)
  --strict                        Treat unresolved references as errors
  --runtime-pack <name>           Shared runtime pack (default: Microsoft.NETCore.App)

STUBS OPTIONS:
  -t, --type <name>               Only the type with this full name

EXIT CODES:
  0 success, 1 error, 2 usage error, 3 module could not be read

EXAMPLES:
  dnpeek framework bin/App.json
  dnpeek resolve bin/App.json System.Runtime -L lib
  dnpeek references bin/App.json --strict
  dnpeek stubs bin/App.json --type Contoso.Widget
`);
};
