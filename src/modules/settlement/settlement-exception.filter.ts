import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import { SettlementException } from './exceptions/settlement.exceptions';

interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

/**
 * Renders settlement failures as `{ success: false, error: { code, message, details } }`.
 */
@Catch(SettlementException)
export class SettlementExceptionFilter implements ExceptionFilter<SettlementException> {
  private readonly logger = new Logger(SettlementExceptionFilter.name);

  catch(exception: SettlementException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<JsonResponse>();
    const status = exception.getStatus();

    this.logger.warn({
      event: 'settlement_rejected',
      code: exception.code,
      status,
      message: exception.message,
    });

    response.status(status).json(exception.getResponse());
  }
}
