import { Response } from 'express';

/**
 * Signal that fires when the client goes away before the response is sent,
 * so an in-flight model call can be dropped.
 */
export function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}
