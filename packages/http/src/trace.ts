import { AsyncLocalStorage } from 'node:async_hooks';
import { performance } from 'node:perf_hooks';

export type TraceEvent =
  | 'getConn'
  | 'gotConn'
  | 'dnsStart'
  | 'dnsDone'
  | 'connectStart'
  | 'connectDone'
  | 'tlsHandshakeStart'
  | 'tlsHandshakeDone'
  | 'wroteRequest'
  | 'gotFirstResponseByte';

export interface ConnectionInfo {
  reused: boolean;
  wasIdle: boolean;
  idleTimeMs: number;
}

/**
 * Per-attempt timings in milliseconds. Phases whose events never fired are 0.
 */
export interface TraceInfo {
  dnsLookupTime: number;
  tcpConnTime: number;
  tlsHandshakeTime: number;
  /** Time to obtain a connection from the pool or a new dial */
  connTime: number;
  /** Request fully written to first response byte */
  serverTime: number;
  /** First response byte to the end of the attempt */
  responseTime: number;
  totalTime: number;
  connReused: boolean;
  connWasIdle: boolean;
  connIdleTime: number;
}

const span = (from: number | undefined, to: number | undefined): number =>
  from === undefined || to === undefined ? 0 : Math.max(0, to - from);

export class ClientTrace {
  readonly start: number;
  private readonly stamps = new Map<TraceEvent, number>();
  private end: number | undefined;
  private connection: ConnectionInfo | undefined;

  constructor(private readonly now: () => number = () => performance.now()) {
    this.start = now();
  }

  mark(event: TraceEvent, at: number = this.now()): void {
    this.stamps.set(event, at);
  }

  gotConn(info: ConnectionInfo, at: number = this.now()): void {
    this.mark('gotConn', at);
    this.connection = info;
  }

  done(at: number = this.now()): void {
    this.end = at;
  }

  info(): TraceInfo {
    const at = (event: TraceEvent) => this.stamps.get(event);

    return {
      dnsLookupTime: span(at('dnsStart'), at('dnsDone')),
      tcpConnTime: span(at('connectStart'), at('connectDone')),
      tlsHandshakeTime: span(at('tlsHandshakeStart'), at('tlsHandshakeDone')),
      connTime: span(at('getConn'), at('gotConn')),
      serverTime: span(at('wroteRequest'), at('gotFirstResponseByte')),
      responseTime: span(at('gotFirstResponseByte'), this.end),
      totalTime: span(this.start, this.end),
      connReused: this.connection?.reused ?? false,
      connWasIdle: this.connection?.wasIdle ?? false,
      connIdleTime: this.connection?.idleTimeMs ?? 0,
    };
  }
}

const activeTrace = new AsyncLocalStorage<ClientTrace>();

/**
 * Run fn with trace as the active trace; transports stamp it as the attempt progresses
 */
export const runWithTrace = <T>(trace: ClientTrace | undefined, fn: () => Promise<T>): Promise<T> =>
  trace ? activeTrace.run(trace, fn) : fn();

export const getActiveTrace = (): ClientTrace | undefined => activeTrace.getStore();
