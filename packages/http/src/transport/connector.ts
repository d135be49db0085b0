import { isIP, type Socket, connect as netConnect } from 'node:net';
import { performance } from 'node:perf_hooks';
import { type ConnectionOptions, connect as tlsConnect } from 'node:tls';

import { type buildConnector, errors } from 'undici';

/**
 * Dial timestamps of one socket, on the performance.now() clock
 */
export interface ConnectionTimings {
  dnsStart?: number | undefined;
  dnsDone?: number | undefined;
  connectStart: number;
  connectDone?: number | undefined;
  tlsStart?: number | undefined;
  tlsDone?: number | undefined;
}

export interface TimedConnectorOptions {
  timeoutMs: number;
  keepAliveInitialDelayMs?: number | undefined;
  now?: (() => number) | undefined;
}

const socketTimings = new WeakMap<Socket, ConnectionTimings>();

export const getConnectionTimings = (socket: Socket): ConnectionTimings | undefined => socketTimings.get(socket);

const stripBrackets = (hostname: string): string =>
  hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;

/**
 * Socket connector for undici that records DNS, TCP and TLS timings per socket
 */
export const createTimedConnector = (options: TimedConnectorOptions): buildConnector.connector => {
  const now = options.now ?? (() => performance.now());

  return (connectOptions, callback) => {
    const started = now();
    const secure = connectOptions.protocol === 'https:';
    const host = stripBrackets(connectOptions.hostname);
    const port = Number(connectOptions.port) || (secure ? 443 : 80);
    const timings: ConnectionTimings = { connectStart: started };

    let socket: Socket;
    if (secure) {
      const tlsOptions: ConnectionOptions = { ALPNProtocols: ['http/1.1'], host, port };
      const servername = connectOptions.servername ?? (isIP(host) === 0 ? host : undefined);
      if (servername) {
        tlsOptions.servername = servername;
      }
      if (connectOptions.httpSocket) {
        tlsOptions.socket = connectOptions.httpSocket;
      }
      socket = tlsConnect(tlsOptions);
    } else {
      socket = netConnect({ host, port });
    }
    socketTimings.set(socket, timings);

    let settled = false;
    const settle = (error: Error | undefined) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.off('error', onError);
      if (error) {
        socket.destroy();
        callback(error, null);
      } else {
        callback(null, socket);
      }
    };
    const onError = (error: Error) => settle(error);
    const timer = setTimeout(
      () => settle(new errors.ConnectTimeoutError(`Connect timeout after ${options.timeoutMs}ms`)),
      options.timeoutMs
    );

    socket.setNoDelay(true);
    socket.setKeepAlive(true, options.keepAliveInitialDelayMs ?? 60_000);
    socket.once('lookup', () => {
      timings.dnsStart = started;
      timings.dnsDone = now();
      timings.connectStart = timings.dnsDone;
    });
    socket.once('connect', () => {
      timings.connectDone = now();
      if (secure) {
        timings.tlsStart = timings.connectDone;
      } else {
        settle(undefined);
      }
    });
    if (secure) {
      socket.once('secureConnect', () => {
        timings.tlsDone = now();
        settle(undefined);
      });
    }
    socket.once('error', onError);
  };
};
