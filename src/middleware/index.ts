export { validateApiKey } from './auth.js';
export type { AuthErrorResponse } from './auth.js';
export {
  errorHandler,
  asyncHandler,
  ApiError,
  getStatusCodeForServiceError,
} from './errorHandler.js';
export { requestLogger, getRequestId } from './requestLogger.js';
