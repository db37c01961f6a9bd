import { describe, expect, it } from 'vitest';
import {
  DuplicateNameError,
  EmptyTargetError,
  IllegalTokenError,
  OracleUnavailableError,
} from '@/core/errors';
import { EngineError, EngineNotFoundError } from '@/engine/errors';
import { AppError, formatErrorResponse } from './error-handler';

describe('formatErrorResponse', () => {
  it('keeps the code, status and details of an AppError', () => {
    const { response, statusCode } = formatErrorResponse(
      new AppError('CONFLICT', 'Already graded', 409, { openingId: 'op_1' })
    );

    expect(statusCode).toBe(409);
    expect(response).toEqual({
      success: false,
      error: { code: 'CONFLICT', message: 'Already graded', details: { openingId: 'op_1' } },
    });
  });

  it('maps study errors to their status', () => {
    expect(formatErrorResponse(new DuplicateNameError('Scotch')).statusCode).toBe(409);
    expect(formatErrorResponse(new EmptyTargetError()).statusCode).toBe(422);
    expect(formatErrorResponse(new OracleUnavailableError('engine gone')).statusCode).toBe(503);
  });

  it('adds the token and ply of an illegal move', () => {
    const { response, statusCode } = formatErrorResponse(new IllegalTokenError('Nf9', 5));

    expect(statusCode).toBe(400);
    expect(response.error).toEqual({
      code: 'ILLEGAL_MOVE',
      message: "Invalid SAN move 'Nf9' at ply 5.",
      details: { token: 'Nf9', ply: 5 },
    });
  });

  it('reports a missing engine as unavailable and other engine failures as 502', () => {
    expect(formatErrorResponse(new EngineNotFoundError('no stockfish'))).toEqual({
      response: { success: false, error: { code: 'SERVICE_UNAVAILABLE', message: 'no stockfish' } },
      statusCode: 503,
    });
    expect(formatErrorResponse(new EngineError('timed out')).statusCode).toBe(502);
  });

  it('answers 500 for unexpected errors', () => {
    const { response, statusCode } = formatErrorResponse(new TypeError('boom'));

    expect(statusCode).toBe(500);
    expect(response.error.code).toBe('INTERNAL_ERROR');
    expect(response.error.message).toBe('boom');
  });
});
