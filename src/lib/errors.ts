/**
 * Error kinds raised by the process, shell and submission layers.
 *
 * @module
 */

/** Base class for every error raised by this package. */
export class CondorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The requested execution environment is not a supported universe. */
export class InvalidUniverseError extends CondorError {
  constructor(readonly value?: string) {
    super(
      value === undefined
        ? 'Invalid Condor universe specified.'
        : `${value} is not a valid Condor universe.`,
    );
  }
}

/** Input was written to a process whose stdin is already closed. */
export class ProcessDeadError extends CondorError {
  constructor(readonly pid?: number) {
    super(
      pid === undefined
        ? 'Unable to talk to a process because it is dead.'
        : `Unable to talk to process ${String(pid)} because it is dead.`,
    );
  }
}

/** An external tool replied with output that does not match its contract. */
export class BadFormatError extends CondorError {
  constructor(readonly tool?: string) {
    super(
      tool
        ? `Unable to parse invalid output from process '${tool}'.`
        : "Unable to parse process's invalid output.",
    );
  }
}

/** An operation that needs a submitted job was called before submission. */
export class SubmissionError extends CondorError {
  constructor(readonly operation?: string) {
    super(
      operation
        ? `Cannot call '${operation}' because the job has not been submitted yet.`
        : 'The job has not been submitted yet.',
    );
  }
}

/** `submit()` was called on a job that already owns a cluster id. */
export class AlreadySubmittedError extends CondorError {
  constructor(readonly clusterId: number) {
    super(
      `The job was already submitted as cluster ${String(clusterId)}; build a new job to submit again.`,
    );
  }
}

/** Base class for errors about submission settings. */
export class SettingError extends CondorError {}

/** A mandatory setting was read before it was set. */
export class RequiredSetting extends SettingError {
  constructor(readonly setting?: string) {
    super(
      setting === undefined
        ? 'A setting is unexpectedly not set yet.'
        : `The setting ${setting} should have been set before doing this.`,
    );
  }
}

/** An optional setting was read before it was set. */
export class EmptySetting extends SettingError {
  constructor(readonly setting?: string) {
    super(
      setting === undefined
        ? 'The optional setting requested has not been set yet.'
        : `The optional setting ${setting} has not been set yet.`,
    );
  }
}

/** A setting was given a value outside its accepted range. */
export class InvalidSettingError extends SettingError {
  constructor(
    readonly setting: string,
    readonly detail: string,
  ) {
    super(`Invalid value for ${setting}: ${detail}`);
  }
}

/** A command line contains a quote character that would corrupt the description. */
export class BadQuotes extends SettingError {
  constructor(readonly character?: string) {
    super(BadQuotes.describe(character));
  }

  private static describe(character?: string): string {
    if (character === undefined) {
      return 'The supplied string contains improper quoting. Escape quotes properly and try again.';
    }
    if (character === '"') {
      return (
        'The supplied string contains a double quote (") that is not escaped properly. ' +
        "An entire argument with spaces should be surrounded by single quotes instead ('). " +
        'Otherwise, escape the double quote with another double quote ("").'
      );
    }
    return `The supplied string contains an invalid ${character} character. Remove this character and try again.`;
  }
}
