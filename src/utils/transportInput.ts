import { TLSSocket } from 'tls';
import type { Request } from 'express';
import type { TransportInput } from '../detection/types/index.js';

/**
 * Reads the transport-level facts of an Express request
 */
export function fromExpressRequest(req: Request): TransportInput {
  const { socket } = req;
  const input: TransportInput = {
    headers: req.headers,
    peerAddress: socket.remoteAddress,
    method: req.method,
    path: req.path,
    protocol: `HTTP/${req.httpVersion}`,
    port: socket.localPort,
    isSecure: req.secure,
  };

  if (socket instanceof TLSSocket) {
    input.cipherSuite = socket.getCipher()?.name;
    input.tlsVersion = socket.getProtocol() ?? undefined;
  }

  return input;
}
