import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';

/**
 * Routes match on the raw request path: a trailing slash or a query string
 * makes it a different path, answered with an empty 404.
 */
@Injectable()
export class ExactPathMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const url = req.originalUrl;

    if (url.includes('?') || (url.length > 1 && url.endsWith('/'))) {
      res.status(404).end();
      return;
    }

    next();
  }
}
