import { Request, Response, NextFunction } from 'express';
import { config } from '../config/env.js';

/**
 * Error response interface for authentication failures
 */
export interface AuthErrorResponse {
  error: string;
  message: string;
  timestamp: string;
}

function unauthorized(res: Response, message: string): void {
  const body: AuthErrorResponse = {
    error: 'Unauthorized',
    message,
    timestamp: new Date().toISOString(),
  };
  res.status(401).json(body);
}

/**
 * Authentication middleware that validates the admin API key from the
 * X-API-KEY header
 */
export function validateApiKey(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const apiKey = req.headers['x-api-key'];

  // Ensure API key is a string (not an array)
  const providedKey = Array.isArray(apiKey) ? apiKey[0] : apiKey;

  if (!providedKey) {
    unauthorized(res, 'X-API-KEY header is required');
    return;
  }

  if (providedKey !== config.ADMIN_API_KEY) {
    unauthorized(res, 'Invalid API key');
    return;
  }

  next();
}
