/**
 * Run configuration for the metricgen CLI.
 */

export interface GenerateConfig {
  /** Path to the JSON metrics document. */
  readonly configPath: string;
  /** Destination of the generated TypeScript module. */
  readonly outputPath: string;
  /** Namespace wrapping every generated declaration. */
  readonly packageName: string;
}
