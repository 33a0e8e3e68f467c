/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
Bridgeforge - generated bindings to bridge modules v${VERSION}

USAGE:
  bridgeforge <command> [options]

COMMANDS:
  convert [input]           Convert a raw module into a bridge module

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: bridgeforge.json)

CONVERT OPTIONS:
  -o, --out <dir>           Output directory (default: generated)
  -I, --include <header>    Add a native header (repeatable)
  --pod <type>              Pass a type by value (repeatable)
  --legacy                  Omit extern type declarations

EXAMPLES:
  bridgeforge convert
  bridgeforge convert bindings.json --pod geo::Point
  bridgeforge convert -I widget.h -o out
`);
};
