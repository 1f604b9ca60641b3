import { Response } from 'express';
import { ApiResponse } from '../types';
import { errorMessage, statusForError } from './errors';
import logger from './logger';

export function sendSuccess<T>(res: Response, result: T, status: number = 200): void {
  const response: ApiResponse<T> = {
    success: true,
    result,
    timestamp: new Date().toISOString()
  };
  res.status(status).json(response);
}

export function sendFailure(res: Response, status: number, error: string): void {
  const response: ApiResponse = {
    success: false,
    error,
    timestamp: new Date().toISOString()
  };
  res.status(status).json(response);
}

/**
 * 오류 종류에 따라 상태 코드를 결정해 응답
 */
export function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  if (status >= 500) {
    logger.error(`[API] ${errorMessage(error)}`);
  } else {
    logger.warn(`[API] ${errorMessage(error)}`);
  }
  sendFailure(res, status, errorMessage(error));
}
