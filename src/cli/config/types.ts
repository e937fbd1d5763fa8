/**
 * CLI command options (from commander)
 */

export interface MigrateCommandOptions {
  config: string;
  source?: string[];
  format?: string;
  outputDir?: string;
  report?: string;
  targetUri?: string;
  targetDb?: string;
  region?: string;
  dayFirst?: boolean;
}

export interface CheckCommandOptions {
  config: string;
}

export interface GlobalOptions {
  logLevel?: string;
}
