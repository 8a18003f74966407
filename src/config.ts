import { resolve } from "path";

export const ALL_SETTINGS: Setting[] = [];

/**
 * Helper class to look up a labelled (and possibly nested) setting.
 *
 * Settings are read from the environment. The variable name is derived from
 * the qualified name, e.g. `codeqlPostproc.log.file` is read from
 * `CODEQL_POSTPROC_LOG_FILE`.
 */
export class Setting {
  name: string;
  parent?: Setting;
  private _hasChildren = false;

  constructor(name: string, parent?: Setting) {
    this.name = name;
    this.parent = parent;
    if (parent !== undefined) {
      parent._hasChildren = true;
    }
    ALL_SETTINGS.push(this);
  }

  get hasChildren() {
    return this._hasChildren;
  }

  get qualifiedName(): string {
    if (this.parent === undefined) {
      return this.name;
    } else {
      return `${this.parent.qualifiedName}.${this.name}`;
    }
  }

  get environmentVariable(): string {
    return this.qualifiedName
      .split(".")
      .map((part) => part.replace(/([a-z0-9])([A-Z])/g, "$1_$2"))
      .join("_")
      .toUpperCase();
  }

  getValue(env: NodeJS.ProcessEnv = process.env): string | undefined {
    if (this.hasChildren) {
      throw new Error(
        `Cannot get the value of setting '${this.qualifiedName}' which has children.`,
      );
    }
    const value = env[this.environmentVariable];
    return value === "" ? undefined : value;
  }
}

const ROOT_SETTING = new Setting("codeqlPostproc");

const LOG_SETTING = new Setting("log", ROOT_SETTING);
export const LOG_FILE_SETTING = new Setting("file", LOG_SETTING);
export const LOG_VERBOSE_SETTING = new Setting("verbose", LOG_SETTING);

const TRUTHY_VALUES = ["1", "true", "yes", "on"];

export interface LoggingConfig {
  /** Whether log messages are written to the terminal. */
  verbose: boolean;
  /** Absolute path of an additional log file, if any. */
  logFile: string | undefined;
}

/**
 * Options given on the command line. These take precedence over the environment.
 */
export interface LoggingOverrides {
  verbose?: boolean;
  logFile?: string;
}

export function getLoggingConfig(
  overrides: LoggingOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): LoggingConfig {
  const verboseValue = LOG_VERBOSE_SETTING.getValue(env);
  const verbose =
    overrides.verbose ??
    (verboseValue !== undefined &&
      TRUTHY_VALUES.includes(verboseValue.toLowerCase()));

  const logFile = overrides.logFile ?? LOG_FILE_SETTING.getValue(env);

  return {
    verbose,
    logFile: logFile === undefined ? undefined : resolve(cwd, logFile),
  };
}
