/**
 * Type definitions for CLI
 */

/**
 * Bridgeforge configuration file (bridgeforge.json)
 */
export type BridgeforgeConfig = {
  readonly $schema?: string;
  /** Raw module JSON written by the binding generator */
  readonly input: string;
  /** Native headers for the bridge's `include!` directives */
  readonly includes: readonly string[];
  readonly extraInclude?: string;
  /** Qualified names of aggregates to pass by value */
  readonly podTypes?: readonly string[];
  readonly legacyMode?: boolean;
  readonly outputDirectory?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  include?: string[];
  pod?: string[];
  legacy?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing bridgeforge.json
  readonly inputPath: string;
  readonly includes: readonly string[];
  readonly extraInclude: string | undefined;
  readonly podTypes: readonly string[];
  readonly legacyMode: boolean;
  readonly outputDirectory: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
