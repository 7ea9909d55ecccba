/**
 * Take a request's socket away from the HTTP server for streaming
 *
 * The handler must not touch the response afterwards: everything on the wire
 * from here on is written by the consumer session.
 */

import type { IncomingMessage } from 'node:http';
import type { Socket } from 'node:net';
import type { RequestMeta } from './utils.ts';

export interface HijackedConnection {
  socket: Socket;
  request: RequestMeta;
}

export function hijackConnection(req: IncomingMessage): HijackedConnection {
  const socket = req.socket;

  // A stream is silent between frames; the server's timeouts would cut it
  socket.setTimeout(0);
  socket.setNoDelay(true);
  socket.setKeepAlive(true);

  return {
    socket,
    request: {
      method: req.method,
      url: req.url,
      headers: req.headers,
    },
  };
}
