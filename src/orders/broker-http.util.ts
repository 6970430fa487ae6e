import {
  BadGatewayException,
  GatewayTimeoutException,
  HttpException,
  InternalServerErrorException,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  BrokerRejectedError,
  describeError,
  ConnectionLostError,
  NotReadyError,
  ReconnectExhaustedError,
  RequestTimeoutError,
  ShutdownError,
} from '../broker/broker.errors';

/** Map a broker session failure onto the HTTP status the REST caller sees. */
export function toHttpException(err: unknown): HttpException {
  if (err instanceof HttpException) return err;
  if (err instanceof RequestTimeoutError) return new GatewayTimeoutException(err.message);
  if (err instanceof BrokerRejectedError) return new BadGatewayException(err.message);
  if (
    err instanceof NotReadyError ||
    err instanceof ConnectionLostError ||
    err instanceof ShutdownError ||
    err instanceof ReconnectExhaustedError
  ) {
    return new ServiceUnavailableException(err.message);
  }
  return new InternalServerErrorException(describeError(err));
}
