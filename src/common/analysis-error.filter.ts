import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common'
import type { Response } from 'express'
import { AnalysisError, type AnalysisErrorCode } from './analysis.errors'

const STATUS_BY_CODE: Record<AnalysisErrorCode, HttpStatus> = {
  InsufficientData: HttpStatus.UNPROCESSABLE_ENTITY,
  NoPrimarySignal: HttpStatus.UNPROCESSABLE_ENTITY,
  MalformedTarget: HttpStatus.UNPROCESSABLE_ENTITY,
  OutOfOrderUpdate: HttpStatus.CONFLICT,
  InvalidConfiguration: HttpStatus.BAD_REQUEST,
  InvalidInput: HttpStatus.BAD_REQUEST,
}

export const statusForAnalysisError = (error: AnalysisError): HttpStatus => STATUS_BY_CODE[error.code]

@Catch(AnalysisError)
export class AnalysisErrorFilter implements ExceptionFilter<AnalysisError> {
  private readonly logger = new Logger(AnalysisErrorFilter.name)

  catch(error: AnalysisError, host: ArgumentsHost) {
    const statusCode = statusForAnalysisError(error)
    this.logger.warn(`${error.code}: ${error.message}`)
    host
      .switchToHttp()
      .getResponse<Response>()
      .status(statusCode)
      .json({ statusCode, error: error.code, message: error.message })
  }
}
