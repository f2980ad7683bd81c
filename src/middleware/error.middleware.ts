import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, ProblemDetails } from '../errors';

const PROBLEM_JSON = 'application/problem+json';

function send(reply: FastifyReply, problem: ProblemDetails) {
  return reply.status(problem.status).header('Content-Type', PROBLEM_JSON).send(problem);
}

/**
 * Renders every error as an RFC 7807 body carrying the request id as
 * correlationId.
 */
export function createErrorHandler(options: { exposeInternalErrors: boolean }) {
  return function errorHandler(error: FastifyError | AppError, request: FastifyRequest, reply: FastifyReply) {
    const correlationId = request.id;

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      } else {
        request.log.warn({ code: error.code, statusCode: error.statusCode }, error.message);
      }
      return send(reply, { ...error.toProblemDetails(request.url), correlationId });
    }

    const statusCode = error.statusCode ?? 500;

    // Fastify schema and content-type parsing errors
    if (error.validation || (statusCode >= 400 && statusCode < 500 && statusCode !== 429)) {
      request.log.warn({ code: error.code, statusCode }, error.message);
      return send(reply, {
        type: `https://httpstatuses.com/${statusCode}`,
        title: statusCode === 400 ? 'Bad Request' : 'Client Error',
        status: statusCode,
        detail: error.message,
        code: error.code ?? 'BAD_REQUEST',
        instance: request.url,
        correlationId,
      });
    }

    if (statusCode === 429) {
      return send(reply, {
        type: 'https://httpstatuses.com/429',
        title: 'Too Many Requests',
        status: 429,
        detail: 'Too many requests. Please try again later.',
        code: 'RATE_LIMITED',
        instance: request.url,
        correlationId,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return send(reply, {
      type: 'https://httpstatuses.com/500',
      title: 'Internal Server Error',
      status: 500,
      detail: options.exposeInternalErrors ? error.message || 'Internal server error' : 'Internal server error',
      code: 'INTERNAL_ERROR',
      instance: request.url,
      correlationId,
    });
  };
}
