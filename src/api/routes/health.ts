/**
 * Health check. Lightweight on purpose: no database or engine access.
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  timestamp: string;
  environment: string;
  version: string;
}

export const APP_VERSION = '0.1.0';

export function healthRoutes(clock: () => Date = () => new Date()): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: clock().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
    };

    return success(c, healthData);
  });

  return router;
}
