import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express, { type NextFunction, type Request, type Response } from 'express';
import { escapeHtml } from '@termmail/shared';
import { AuthError } from '../errors';

export const CALLBACK_PATH = '/callback';
export const LOGIN_TIMEOUT_MS = 5 * 60_000;

export interface CallbackServerOptions {
  /** 0 picks a free port */
  port: number;
  expectedState: string;
  timeoutMs?: number;
}

export interface CallbackServer {
  redirectUri: string;
  /** Settles once: the code, a rejected callback or the timeout. */
  code: Promise<string>;
  close(): Promise<void>;
}

/**
 * Loopback server receiving the authorization redirect. It stops listening
 * as soon as `code` settles.
 */
export async function startCallbackServer(options: CallbackServerOptions): Promise<CallbackServer> {
  const app = express();
  let settle: { resolve: (code: string) => void; reject: (err: Error) => void } | undefined;
  const code = new Promise<string>((resolve, reject) => {
    settle = { resolve, reject };
  });

  app.get(CALLBACK_PATH, (req: Request, res: Response, next: NextFunction) => {
    const { code: received, state, error, error_description: description } = req.query;
    if (typeof error === 'string') {
      next(new AuthError(`Sign-in failed: ${typeof description === 'string' ? description : error}`));
      return;
    }
    if (typeof received !== 'string' || state !== options.expectedState) {
      next(new AuthError('Invalid sign-in response (state mismatch)'));
      return;
    }
    res.once('finish', () => settle?.resolve(received));
    res.type('html').send(page('Signed in', 'You can close this window and return to the terminal.'));
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    res.once('finish', () => settle?.reject(err));
    res.status(400).type('html').send(page('Sign-in failed', err.message));
  });

  const server = await listen(app, options.port);
  const { port } = addressOf(server);
  const timer = setTimeout(() => {
    settle?.reject(new AuthError('Sign-in timed out; run "termmail login" again'));
  }, options.timeoutMs ?? LOGIN_TIMEOUT_MS);

  const close = () =>
    new Promise<void>((resolve) => {
      clearTimeout(timer);
      server.close(() => resolve());
      server.closeAllConnections();
    });

  void code.then(close, close);

  return {
    redirectUri: `http://localhost:${port}${CALLBACK_PATH}`,
    code,
    close,
  };
}

function listen(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, '127.0.0.1');
    server.once('listening', () => resolve(server));
    server.once('error', (err: NodeJS.ErrnoException) => {
      reject(
        err.code === 'EADDRINUSE'
          ? new AuthError(`Port ${port} is already in use; set TERMMAIL_REDIRECT_PORT`)
          : err
      );
    });
  });
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Callback server is not listening on a TCP port');
  }
  return address;
}

function page(title: string, message: string): string {
  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>
<body style="font-family: system-ui, sans-serif; text-align: center; padding: 50px;">
  <h1>${escapeHtml(title)}</h1>
  <p>${escapeHtml(message)}</p>
</body>
</html>`;
}
