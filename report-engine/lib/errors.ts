/**
 * A problem with how we have been invoked (options, thresholds, missing tools).
 * These are always detected before any VCF is opened and end the run.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The external annotation utility failed while processing a single VCF.
 */
export class ExtractorToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractorToolError";
  }
}
