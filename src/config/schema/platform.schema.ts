/**
 * Platform Config Schema
 *
 * Host facts the pipeline config is resolved against. Null fields are
 * detected at resolve time.
 *
 * @module config/schema/platform
 */

export interface PlatformSchema {
  /** Logical CPUs available to the process (null = detect) */
  cpuCount: number | null;

  /**
   * Constrained execution environment with no usable GPU, e.g. a CI runner
   * or emulator (null = detect from CADENCE_CPU_ONLY).
   */
  constrained: boolean | null;
}

/** Default platform configuration */
export const DEFAULT_PLATFORM_CONFIG: PlatformSchema = {
  cpuCount: null,
  constrained: null,
};

/** Environment variable that marks the host as constrained */
export const CONSTRAINED_ENV_VAR = 'CADENCE_CPU_ONLY';
