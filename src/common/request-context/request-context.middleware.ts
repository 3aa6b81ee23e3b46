import { Injectable, NestMiddleware } from '@nestjs/common';
import { Response } from 'express';
import { IncomingRequest, RequestContext } from './request-context';

export const REQUEST_ID_HEADER = 'x-request-id';

/** Opens the request context for the rest of the pipeline and echoes its id to the caller. */
@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  use(req: IncomingRequest, res: Pick<Response, 'setHeader'>, next: () => void) {
    const context = RequestContext.bindRequest(req);
    res.setHeader(REQUEST_ID_HEADER, context.requestId);
    RequestContext.run(context, next);
  }
}
