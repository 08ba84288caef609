import type express from 'express';

/** Express 4 does not await handlers; forward rejections to the error handler. */
export function asyncRoute(handler: (req: express.Request, res: express.Response) => Promise<void>): express.RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}
