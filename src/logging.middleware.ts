import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request } from 'express';

type LoggedRequest = Pick<Request, 'method' | 'originalUrl' | 'query' | 'body'>;

@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  use(req: LoggedRequest, _res: unknown, next: () => void) {
    // paths look like /v1/<controller>/...
    const controllerPath = req.originalUrl.split('?')[0].split('/')[2];
    if (!controllerPath) {
      return next();
    }
    const controllerName = controllerPath.charAt(0).toUpperCase() + controllerPath.slice(1) + 'Controller';
    const logger = new Logger(controllerName);
    // quotes, trades and strategy writes carry their parameters in the body
    const parameters =
      req.method === 'GET' ? `Query Parameters: ${JSON.stringify(req.query)}` : `Body: ${JSON.stringify(req.body)}`;
    logger.log(`${req.method} ${req.originalUrl}, ${parameters}`);
    next();
  }
}
