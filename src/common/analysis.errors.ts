export type AnalysisErrorCode =
  | 'InsufficientData'
  | 'NoPrimarySignal'
  | 'OutOfOrderUpdate'
  | 'MalformedTarget'
  | 'InvalidConfiguration'
  | 'InvalidInput'

/**
 * Base class for every condition the analysis core reports to its caller.
 * `code` is stable and is what HTTP clients see in the `error` field.
 */
export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class InsufficientDataError extends AnalysisError {
  readonly code = 'InsufficientData' as const

  constructor(
    readonly activeDurationS: number,
    readonly requiredDurationS: number,
  ) {
    super(
      `Activity has ${activeDurationS}s of valid samples, at least ${requiredDurationS}s are required`,
    )
  }
}

export class NoPrimarySignalError extends AnalysisError {
  readonly code = 'NoPrimarySignal' as const

  constructor() {
    super('Activity has no power, pace or heart rate samples to segment on')
  }
}

export class OutOfOrderUpdateError extends AnalysisError {
  readonly code = 'OutOfOrderUpdate' as const

  constructor(
    readonly athleteId: string,
    readonly attemptedAt: Date,
    readonly lastUpdate: Date,
  ) {
    super(
      `Training load update for athlete ${athleteId} at ${attemptedAt.toISOString()} ` +
        `is earlier than the last update at ${lastUpdate.toISOString()}`,
    )
  }
}

export class MalformedTargetError extends AnalysisError {
  readonly code = 'MalformedTarget' as const

  constructor(
    readonly lower: number,
    readonly upper: number,
  ) {
    super(`Target band is malformed: lower ${lower} is above upper ${upper}`)
  }
}

export class InvalidConfigurationError extends AnalysisError {
  readonly code = 'InvalidConfiguration' as const
}

export class InvalidInputError extends AnalysisError {
  readonly code = 'InvalidInput' as const
}
