/**
 * HTTP request metrics
 *
 * Requests are labelled with the route pattern they matched, such as
 * `/payments/balance/:userId`, so user and transaction ids never become
 * label values. Requests that matched no route share one label.
 */

import { Request, Response, NextFunction } from 'express';

import { httpRequestsTotal, httpRequestDuration } from './metrics';

export const UNMATCHED_ROUTE = 'unmatched';

export const routeLabel = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : UNMATCHED_ROUTE;
};

export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  // Scrapes are not traffic
  if (req.path === '/metrics') {
    next();
    return;
  }

  const stopTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = {
      method: req.method,
      path: routeLabel(req),
      status: String(res.statusCode),
    };

    httpRequestsTotal.inc(labels);
    stopTimer(labels);
  });

  next();
};
