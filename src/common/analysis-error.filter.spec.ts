import type { ArgumentsHost } from '@nestjs/common'
import { AnalysisErrorFilter, statusForAnalysisError } from './analysis-error.filter'
import {
  InsufficientDataError,
  InvalidConfigurationError,
  InvalidInputError,
  NoPrimarySignalError,
  OutOfOrderUpdateError,
} from './analysis.errors'

describe('AnalysisErrorFilter', () => {
  it('maps each error code to a status', () => {
    expect(statusForAnalysisError(new InsufficientDataError(10, 60))).toBe(422)
    expect(statusForAnalysisError(new NoPrimarySignalError())).toBe(422)
    expect(
      statusForAnalysisError(
        new OutOfOrderUpdateError('athlete-1', new Date('2025-01-01T00:00:00Z'), new Date('2025-01-02T00:00:00Z')),
      ),
    ).toBe(409)
    expect(statusForAnalysisError(new InvalidConfigurationError('bad'))).toBe(400)
    expect(statusForAnalysisError(new InvalidInputError('bad'))).toBe(400)
  })

  it('writes the code and message to the response', () => {
    const json = jest.fn()
    const status = jest.fn(() => ({ json }))
    const host = {
      switchToHttp: () => ({ getResponse: () => ({ status }) }),
    } as unknown as ArgumentsHost

    new AnalysisErrorFilter().catch(new InsufficientDataError(10, 60), host)

    expect(status).toHaveBeenCalledWith(422)
    expect(json).toHaveBeenCalledWith({
      statusCode: 422,
      error: 'InsufficientData',
      message: 'Activity has 10s of valid samples, at least 60s are required',
    })
  })
})
