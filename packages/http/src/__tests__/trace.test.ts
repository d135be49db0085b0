import { describe, expect, it } from 'vitest';

import { ClientTrace, getActiveTrace, runWithTrace } from '../trace.js';

const steppedClock = (...times: number[]) => {
  let index = 0;
  return () => times[index++] ?? 0;
};

describe('ClientTrace', () => {
  it('should derive phase durations from lifecycle stamps', () => {
    const trace = new ClientTrace(steppedClock(100));
    trace.mark('getConn', 100);
    trace.mark('dnsStart', 101);
    trace.mark('dnsDone', 105);
    trace.mark('connectStart', 105);
    trace.mark('connectDone', 110);
    trace.mark('tlsHandshakeStart', 110);
    trace.mark('tlsHandshakeDone', 130);
    trace.gotConn({ idleTimeMs: 0, reused: false, wasIdle: false }, 131);
    trace.mark('wroteRequest', 132);
    trace.mark('gotFirstResponseByte', 180);
    trace.done(200);

    expect(trace.info()).toEqual({
      connIdleTime: 0,
      connReused: false,
      connTime: 31,
      connWasIdle: false,
      dnsLookupTime: 4,
      responseTime: 20,
      serverTime: 48,
      tcpConnTime: 5,
      tlsHandshakeTime: 20,
      totalTime: 100,
    });
  });

  it('should report zero for phases that never happened', () => {
    const trace = new ClientTrace(steppedClock(0));
    trace.gotConn({ idleTimeMs: 250, reused: true, wasIdle: true }, 2);
    trace.done(10);

    const info = trace.info();

    expect(info.dnsLookupTime).toBe(0);
    expect(info.tlsHandshakeTime).toBe(0);
    expect(info.connTime).toBe(0);
    expect(info.connReused).toBe(true);
    expect(info.connIdleTime).toBe(250);
    expect(info.totalTime).toBe(10);
  });

  it('should never report a negative duration', () => {
    const trace = new ClientTrace(steppedClock(50));
    trace.mark('wroteRequest', 40);
    trace.mark('gotFirstResponseByte', 30);

    expect(trace.info().serverTime).toBe(0);
    expect(trace.info().totalTime).toBe(0);
  });

  it('should expose the active trace only inside runWithTrace', async () => {
    const trace = new ClientTrace();

    const seen = await runWithTrace(trace, async () => {
      await Promise.resolve();
      return getActiveTrace();
    });

    expect(seen).toBe(trace);
    expect(getActiveTrace()).toBeUndefined();
  });
});
