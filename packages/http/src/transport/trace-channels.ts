import { subscribe } from 'node:diagnostics_channel';
import { Socket } from 'node:net';
import { performance } from 'node:perf_hooks';

import { type ClientTrace, getActiveTrace } from '../trace.js';

import { getConnectionTimings } from './connector.js';

interface SocketUsage {
  served: number;
  releasedAt: number | undefined;
}

const requestTraces = new WeakMap<object, ClientTrace>();
const requestSockets = new WeakMap<object, Socket>();
const socketUsage = new WeakMap<Socket, SocketUsage>();

let installed = false;

const requestOf = (message: unknown): object | undefined => {
  if (typeof message !== 'object' || message === null || !('request' in message)) {
    return undefined;
  }
  const { request } = message;
  return typeof request === 'object' && request !== null ? request : undefined;
};

const socketOf = (message: unknown): Socket | undefined => {
  if (typeof message !== 'object' || message === null || !('socket' in message)) {
    return undefined;
  }
  return message.socket instanceof Socket ? message.socket : undefined;
};

const onRequestCreate = (message: unknown): void => {
  const request = requestOf(message);
  const trace = getActiveTrace();
  if (!request || !trace) {
    return;
  }
  requestTraces.set(request, trace);
  trace.mark('getConn');
};

const onSendHeaders = (message: unknown): void => {
  const request = requestOf(message);
  const socket = socketOf(message);
  if (!request || !socket) {
    return;
  }

  const usage = socketUsage.get(socket) ?? { releasedAt: undefined, served: 0 };
  const trace = requestTraces.get(request);
  if (trace) {
    const at = performance.now();
    const reused = usage.served > 0;
    if (!reused) {
      const timings = getConnectionTimings(socket);
      if (timings?.dnsStart !== undefined) {
        trace.mark('dnsStart', timings.dnsStart);
      }
      if (timings?.dnsDone !== undefined) {
        trace.mark('dnsDone', timings.dnsDone);
      }
      if (timings) {
        trace.mark('connectStart', timings.connectStart);
      }
      if (timings?.connectDone !== undefined) {
        trace.mark('connectDone', timings.connectDone);
      }
      if (timings?.tlsStart !== undefined) {
        trace.mark('tlsHandshakeStart', timings.tlsStart);
      }
      if (timings?.tlsDone !== undefined) {
        trace.mark('tlsHandshakeDone', timings.tlsDone);
      }
    }
    trace.gotConn(
      {
        idleTimeMs: reused && usage.releasedAt !== undefined ? Math.max(0, at - usage.releasedAt) : 0,
        reused,
        wasIdle: reused,
      },
      at
    );
  }

  usage.served += 1;
  socketUsage.set(socket, usage);
  requestSockets.set(request, socket);
};

const onBodySent = (message: unknown): void => {
  const request = requestOf(message);
  if (request) {
    requestTraces.get(request)?.mark('wroteRequest');
  }
};

const onResponseHeaders = (message: unknown): void => {
  const request = requestOf(message);
  if (request) {
    requestTraces.get(request)?.mark('gotFirstResponseByte');
  }
};

const onRequestFinished = (message: unknown): void => {
  const request = requestOf(message);
  const socket = request ? requestSockets.get(request) : undefined;
  const usage = socket ? socketUsage.get(socket) : undefined;
  if (usage) {
    usage.releasedAt = performance.now();
  }
};

/**
 * Subscribe once to undici's diagnostics channels so traced attempts get
 * connection and request lifecycle stamps
 */
export const installTraceChannels = (): void => {
  if (installed) {
    return;
  }
  installed = true;
  subscribe('undici:request:create', onRequestCreate);
  subscribe('undici:client:sendHeaders', onSendHeaders);
  subscribe('undici:request:bodySent', onBodySent);
  subscribe('undici:request:headers', onResponseHeaders);
  subscribe('undici:request:trailers', onRequestFinished);
  subscribe('undici:request:error', onRequestFinished);
};
