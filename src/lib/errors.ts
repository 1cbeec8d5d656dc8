/**
 * Contract errors. These signal misuse of the engine (a plan naming an action
 * the problem does not have, an event fed to the wrong simulator, ...) and are
 * always thrown. Infeasible plans are never reported through these classes:
 * the simulator and validator return them as data.
 */

export class EngineError extends Error {
  public readonly code: string;
  public details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION', message, details);
    this.name = 'ValidationError';
  }
}

export class UnknownActionError extends EngineError {
  constructor(actionName: string, problemName?: string) {
    super(
      'UNKNOWN_ACTION',
      problemName
        ? `Action '${actionName}' does not belong to problem '${problemName}'`
        : `Action '${actionName}' does not belong to the problem`,
      { actionName },
    );
    this.name = 'UnknownActionError';
  }
}

export class ArityError extends EngineError {
  constructor(actionName: string, expected: number, actual: number) {
    super(
      'ARITY',
      `Action '${actionName}' takes ${expected} parameter(s) but ${actual} were given`,
      { actionName, expected, actual },
    );
    this.name = 'ArityError';
  }
}

export class InvalidDurationError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_DURATION', message, details);
    this.name = 'InvalidDurationError';
  }
}

export class UnsupportedTimingError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UNSUPPORTED_TIMING', message, details);
    this.name = 'UnsupportedTimingError';
  }
}

export class UndefinedFluentError extends EngineError {
  constructor(fluentKey: string) {
    super('UNDEFINED_FLUENT', `Fluent '${fluentKey}' has no value and no default`, { fluentKey });
    this.name = 'UndefinedFluentError';
  }
}

export class EvaluationError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('EVALUATION', message, details);
    this.name = 'EvaluationError';
  }
}

export class ForeignEventError extends EngineError {
  constructor(eventLabel: string) {
    super(
      'FOREIGN_EVENT',
      `Event ${eventLabel} was not created by this simulator`,
      { event: eventLabel },
    );
    this.name = 'ForeignEventError';
  }
}

export class ActivityNotStartedError extends EngineError {
  constructor(eventLabel: string, activity: string) {
    super(
      'ACTIVITY_NOT_STARTED',
      `Event ${eventLabel} belongs to '${activity}', which was never started in this state`,
      { event: eventLabel, activity },
    );
    this.name = 'ActivityNotStartedError';
  }
}

export class ActivityEndedError extends EngineError {
  constructor(eventLabel: string, activity: string) {
    super(
      'ACTIVITY_ENDED',
      `Event ${eventLabel} belongs to '${activity}', which already ended in this state`,
      { event: eventLabel, activity },
    );
    this.name = 'ActivityEndedError';
  }
}

export class MissingCapabilityError extends EngineError {
  constructor(capability: string, requiredBy: string) {
    super(
      'MISSING_CAPABILITY',
      `'${requiredBy}' declares simulated effects but no ${capability} was provided`,
      { capability, requiredBy },
    );
    this.name = 'MissingCapabilityError';
  }
}

export class InconsistentPlanError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INCONSISTENT_PLAN', message, details);
    this.name = 'InconsistentPlanError';
  }
}
