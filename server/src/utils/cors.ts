import type { CorsOptions } from 'cors';

import { ForbiddenError } from './errors.js';

/** With no allow-list configured every origin is accepted. */
export function createCorsOptions(allowedOrigins?: string[]): CorsOptions {
  return {
    origin(origin, callback) {
      // Allow requests with no origin (like mobile apps or curl requests)
      if (!origin || !allowedOrigins || allowedOrigins.length === 0) {
        callback(null, true);
        return;
      }

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new ForbiddenError('Not allowed by CORS'), false);
      }
    },
    optionsSuccessStatus: 200,
  };
}
