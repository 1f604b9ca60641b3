import { Request, Response, NextFunction } from 'express';
import { InterfaceIntent } from '../types';
import { sendFailure } from '../utils/api-response';
import logger from '../utils/logger';

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; reason: string };

export interface ConfigureRequest {
  action: InterfaceIntent;
  interfaceName: string;
  ipAddress?: string;
  subnetMask?: string;
  dryRun: boolean;
}

export interface GenerateRequest {
  requirements: string;
  devices?: string[];
  apply: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function optionalBoolean(value: unknown): value is boolean | undefined {
  return value === undefined || typeof value === 'boolean';
}

/**
 * POST /devices/:name/configure 본문 검증
 */
export function validateConfigureRequest(body: unknown): ValidationResult<ConfigureRequest> {
  if (!isRecord(body)) {
    return { valid: false, reason: 'Request body must be a JSON object' };
  }

  const { action, ipAddress, subnetMask, dryRun } = body;
  const interfaceName = body.interface;

  if (action !== 'create' && action !== 'delete') {
    return { valid: false, reason: 'action must be "create" or "delete"' };
  }
  if (typeof interfaceName !== 'string' || interfaceName.trim().length === 0) {
    return { valid: false, reason: 'interface (string) is required' };
  }
  if (!optionalString(ipAddress) || !optionalString(subnetMask)) {
    return { valid: false, reason: 'ipAddress and subnetMask must be strings' };
  }
  if (!optionalBoolean(dryRun)) {
    return { valid: false, reason: 'dryRun must be a boolean' };
  }

  return {
    valid: true,
    value: { action, interfaceName, ipAddress, subnetMask, dryRun: dryRun ?? false },
  };
}

/**
 * POST /generate 본문 검증
 */
export function validateGenerateRequest(body: unknown): ValidationResult<GenerateRequest> {
  if (!isRecord(body)) {
    return { valid: false, reason: 'Request body must be a JSON object' };
  }

  const { requirements, devices, apply } = body;

  if (typeof requirements !== 'string' || requirements.trim().length === 0) {
    return { valid: false, reason: 'requirements (string) is required' };
  }
  let deviceNames: string[] | undefined;
  if (devices !== undefined) {
    if (!Array.isArray(devices) || !devices.every((name): name is string => typeof name === 'string')) {
      return { valid: false, reason: 'devices must be an array of device names' };
    }
    deviceNames = devices;
  }
  if (!optionalBoolean(apply)) {
    return { valid: false, reason: 'apply must be a boolean' };
  }

  return { valid: true, value: { requirements, devices: deviceNames, apply: apply ?? false } };
}

/**
 * Express 미들웨어: JSON 본문 필수
 */
export function requireJsonBody(req: Request, res: Response, next: NextFunction): void {
  if (!req.is('application/json')) {
    logger.warn(`[API] Rejected non-JSON body: ${req.method} ${req.path}`);
    sendFailure(res, 415, 'Content-Type must be application/json');
    return;
  }
  next();
}
