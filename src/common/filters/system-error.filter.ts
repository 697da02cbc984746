import {
  Catch,
  type ExceptionFilter,
  type ArgumentsHost,
  Logger,
} from '@nestjs/common';
import { SystemError } from '../errors/system-error';
import { SystemHealthError } from '../errors/system-health-error';
import { getCorrelationId } from '../services/correlation-context';

interface FastifyLikeResponse {
  status: (code: number) => { send: (body: unknown) => void };
}

@Catch(SystemError)
export class SystemErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(SystemErrorFilter.name);

  catch(exception: SystemError, host: ArgumentsHost): void {
    this.logger.error({
      message: exception.message,
      module: 'system-error-filter',
      correlationId: getCorrelationId(),
      data: {
        code: exception.code,
        severity: exception.severity,
        component:
          exception instanceof SystemHealthError
            ? exception.component
            : undefined,
        stack: exception.stack,
      },
    });

    // Non-HTTP contexts (scheduler ticks) only get the log line
    if (host.getType() !== 'http') {
      return;
    }

    const response = host.switchToHttp().getResponse<FastifyLikeResponse>();
    const statusCode = exception.severity === 'warning' ? 400 : 500;

    response.status(statusCode).send({
      error: {
        code: exception.code,
        message: exception.message,
        severity: exception.severity,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
