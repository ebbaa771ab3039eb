/**
 * Error Handler Plugin
 *
 * Global error handling for Fastify. Engine errors keep their own status
 * and code; anything unexpected becomes a bare 500.
 */

import type { FastifyPluginAsync, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { SplitError, SplitwaveError } from '@splitwave/core';

interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

const statusNames: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  422: 'Unprocessable Entity',
  499: 'Client Closed Request',
  500: 'Internal Server Error',
};

function statusName(statusCode: number): string {
  return statusNames[statusCode] ?? (statusCode >= 500 ? 'Internal Server Error' : 'Bad Request');
}

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const { log } = request;

    // Zod validation errors
    if (error instanceof ZodError) {
      const apiError: ApiError = {
        statusCode: 400,
        error: 'Validation Error',
        message: 'Request validation failed',
        details: error.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      };

      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(apiError);
    }

    // Engine errors carry a user-facing message and their own status
    if (error instanceof SplitError || (error instanceof SplitwaveError && error.statusCode < 500)) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: statusName(error.statusCode),
        code: error.code,
        message: error.message,
      };

      if (error.statusCode >= 500) {
        log.error({ err: error }, 'Split failed');
      } else {
        log.warn({ err: error, code: error.code }, 'Split rejected');
      }
      return reply.status(error.statusCode).send(apiError);
    }

    // Fastify's own client errors (bad JSON, body too large)
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: statusName(error.statusCode),
        message: error.message,
        code: error.code,
      };

      log.warn({ err: error }, 'Client error');
      return reply.status(error.statusCode).send(apiError);
    }

    // Internal server errors
    log.error({ err: error }, 'Internal server error');

    const apiError: ApiError = {
      statusCode: 500,
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    };

    return reply.status(500).send(apiError);
  });

  // Handle 404
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const apiError: ApiError = {
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
    };

    return reply.status(404).send(apiError);
  });
};

export const errorHandler = fp(errorHandlerPlugin, {
  name: 'error-handler',
});
