import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { validateApiKey } from '../auth.js';

// Mock the config module
vi.mock('../../config/env.js', () => ({
  config: {
    ADMIN_API_KEY: 'test-api-key-123',
  },
}));

describe('Authentication Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;
  let jsonSpy: ReturnType<typeof vi.fn>;
  let statusSpy: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    jsonSpy = vi.fn().mockReturnThis();
    statusSpy = vi.fn().mockReturnThis();

    mockRequest = {
      headers: {},
    };

    mockResponse = {
      status: statusSpy,
      json: jsonSpy,
    };

    mockNext = vi.fn() as unknown as NextFunction;
  });

  it('should call next() when valid API key is provided', () => {
    mockRequest.headers = { 'x-api-key': 'test-api-key-123' };

    validateApiKey(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockNext).toHaveBeenCalledOnce();
    expect(statusSpy).not.toHaveBeenCalled();
  });

  it('should return 401 when X-API-KEY header is missing', () => {
    validateApiKey(mockRequest as Request, mockResponse as Response, mockNext);

    expect(statusSpy).toHaveBeenCalledWith(401);
    expect(jsonSpy).toHaveBeenCalledWith({
      error: 'Unauthorized',
      message: 'X-API-KEY header is required',
      timestamp: expect.any(String),
    });
    expect(mockNext).not.toHaveBeenCalled();
  });

  it('should return 401 for an empty API key', () => {
    mockRequest.headers = { 'x-api-key': '' };

    validateApiKey(mockRequest as Request, mockResponse as Response, mockNext);

    expect(statusSpy).toHaveBeenCalledWith(401);
    expect(mockNext).not.toHaveBeenCalled();
  });

  it('should return 401 when API key is invalid', () => {
    mockRequest.headers = { 'x-api-key': 'wrong-key' };

    validateApiKey(mockRequest as Request, mockResponse as Response, mockNext);

    expect(statusSpy).toHaveBeenCalledWith(401);
    expect(jsonSpy).toHaveBeenCalledWith({
      error: 'Unauthorized',
      message: 'Invalid API key',
      timestamp: expect.any(String),
    });
  });
});
