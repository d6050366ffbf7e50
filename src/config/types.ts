/**
 * Configuration types for script generation
 */

/**
 * Complete generator configuration
 */
export interface GeneratorConfig {
  /** Spaces per indentation level */
  indent: number;
  /** Emit the banner comment */
  header: boolean;
  /** Emit the section separator comments */
  sectionComments: boolean;
  /** Stamp the banner with the generation time */
  timestamp: boolean;
}

export type PartialGeneratorConfig = Partial<GeneratorConfig>;

/**
 * Overrides taken from command-line flags
 */
export interface CliConfigOverrides {
  indent?: number | string;
  header?: boolean;
  sectionComments?: boolean;
  timestamp?: boolean;
}
