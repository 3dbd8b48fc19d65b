/**
 * Experiment and backup record types.
 */

/** A scalar read from an experiment file. Dates are smol-toml `TomlDate`s. */
export type ConfigValue = string | number | boolean | Date;

/** Parsed contents of an experiment file. */
export interface ExperimentDefinition {
  /** Column name → value for the `Experiments` row. Always holds `UserDefinedID`. */
  info: Record<string, ConfigValue>;
  parameters: Record<string, ConfigValue>;
  userDefinedId: string;
}

/** Result returned from createExperiment(). */
export interface CreateExperimentResult {
  experimentId: number;
  userDefinedId: string;
  parameterCount: number;
}

export type ExperimentRow = {
  ExperimentID: number;
  UserDefinedID: string;
};

export type ExperimentParameterRow = {
  ExperimentID: number;
  ParameterName: string;
  ParamValueTxt: string;
};

/** A database backup file found on disk. */
export interface BackupFile {
  path: string;
  name: string;
  /** File name without directory or extension. */
  stem: string;
  createdAt: Date;
}

/** Filters applied by findBackups(). Unset bounds are open. */
export interface BackupFilter {
  start?: Date;
  end?: Date;
  pattern?: RegExp;
}
