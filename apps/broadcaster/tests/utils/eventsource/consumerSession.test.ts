import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type Mock,
} from 'vitest';
import { ConsumerSession } from '../../../src/utils/eventsource/ConsumerSession.ts';
import { HandshakeError } from '../../../src/types/errors.ts';
import type {
  EventSourceSettings,
  StaleReporter,
} from '../../../src/utils/eventsource/utils.ts';
import { FakeSocket } from '../../fixtures/fakeSocket.ts';
import { sleep, waitFor } from '../testHelpers.ts';

function makeSettings(
  overrides: Partial<EventSourceSettings> = {},
): EventSourceSettings {
  return {
    writeTimeoutMs: 50,
    idleTimeoutMs: 10_000,
    closeOnWriteTimeout: true,
    queueCapacity: 10,
    ...overrides,
  };
}

function frame(data: string): Buffer {
  return Buffer.from(`data: ${data}\n\n`, 'utf8');
}

describe('ConsumerSession', () => {
  let socket: FakeSocket;
  let onStale: Mock<StaleReporter>;
  const sessions: ConsumerSession[] = [];

  async function open(
    settings: EventSourceSettings = makeSettings(),
    extra: { compress?: boolean; extraHeaders?: string[] } = {},
  ): Promise<ConsumerSession> {
    const session = await ConsumerSession.open(socket, {
      settings,
      compress: extra.compress ?? false,
      extraHeaders: extra.extraHeaders ?? [],
      onStale,
    });
    sessions.push(session);
    return session;
  }

  beforeEach(() => {
    socket = new FakeSocket();
    onStale = vi.fn<StaleReporter>();
  });

  afterEach(async () => {
    for (const session of sessions.splice(0)) {
      session.closeQueue();
      await session.whenClosed();
    }
  });

  describe('handshake', () => {
    it('should write the status line, content type and extra headers', async () => {
      await open(makeSettings(), { extraHeaders: ['X-Test: 1'] });

      expect(socket.headLines).toEqual([
        'HTTP/1.1 200 OK',
        'Content-Type: text/event-stream',
        'X-Test: 1',
      ]);
      expect(socket.body.length).toBe(0);
    });

    it('should announce gzip when compressing', async () => {
      const session = await open(makeSettings(), { compress: true });

      expect(socket.headLines).toEqual([
        'HTTP/1.1 200 OK',
        'Content-Type: text/event-stream',
        'Vary: Accept-Encoding',
        'Content-Encoding: gzip',
      ]);
      expect(session.isCompressed).toBe(true);
    });

    it('should fail with HandshakeError and destroy the socket on a write error', async () => {
      socket.failWrites(new Error('EPIPE'));

      const opening = ConsumerSession.open(socket, {
        settings: makeSettings(),
        compress: false,
        extraHeaders: [],
        onStale,
      });

      await expect(opening).rejects.toBeInstanceOf(HandshakeError);
      await expect(opening).rejects.toThrow(
        'Event stream handshake failed: EPIPE',
      );
      expect(socket.destroyed).toBe(true);
      expect(onStale).not.toHaveBeenCalled();
    });

    it('should fail with HandshakeError when the head write times out', async () => {
      socket.stall();

      await expect(
        ConsumerSession.open(socket, {
          settings: makeSettings({ writeTimeoutMs: 20 }),
          compress: false,
          extraHeaders: [],
          onStale,
        }),
      ).rejects.toThrow(
        'Event stream handshake failed: Write did not complete within 20ms',
      );
      expect(socket.destroyed).toBe(true);
    });
  });

  describe('delivery loop', () => {
    it('should write queued frames in order', async () => {
      const session = await open();
      session.start();

      expect(session.enqueue(frame('a'))).toBe(true);
      expect(session.enqueue(frame('b'))).toBe(true);

      await waitFor(() => socket.body.toString() === 'data: a\n\ndata: b\n\n');
    });

    it('should compress frames for a gzip session', async () => {
      const session = await open(makeSettings(), { compress: true });
      session.start();

      session.enqueue(frame('a'));

      await waitFor(() => socket.readGunzippedBody() === 'data: a\n\n');
    });

    it('should drop frames once its queue is full', async () => {
      const session = await open(makeSettings({ queueCapacity: 2 }));

      expect(session.enqueue(frame('1'))).toBe(true);
      expect(session.enqueue(frame('2'))).toBe(true);
      expect(session.enqueue(frame('3'))).toBe(false);
    });

    it('should be idempotent to start', async () => {
      const session = await open();
      session.start();
      session.start();

      session.enqueue(frame('once'));

      await waitFor(() => socket.body.toString() === 'data: once\n\n');
    });
  });

  describe('closing', () => {
    it('should close the connection gracefully when its queue closes', async () => {
      const session = await open();
      session.start();

      session.closeQueue();
      await session.whenClosed();
      await waitFor(() => socket.destroyed);

      expect(socket.writableFinished).toBe(true);
      expect(session.isStale).toBe(false);
      expect(onStale).not.toHaveBeenCalled();
    });

    it('should write frames queued before the close', async () => {
      const session = await open();
      session.enqueue(frame('last'));
      session.closeQueue();

      session.start();
      await session.whenClosed();

      await waitFor(() => socket.destroyed);
      expect(socket.body.toString()).toBe('data: last\n\n');
    });

    it('should resolve whenClosed before start', async () => {
      const session = await open();

      await expect(session.whenClosed()).resolves.toBeUndefined();
    });
  });

  describe('staleness', () => {
    it('should go stale after the idle timeout', async () => {
      const session = await open(makeSettings({ idleTimeoutMs: 20 }));
      session.start();

      await waitFor(() => onStale.mock.calls.length === 1);

      expect(onStale).toHaveBeenCalledWith(session);
      expect(session.isStale).toBe(true);
      expect(socket.destroyed).toBe(true);
    });

    it('should go stale once on a failed write', async () => {
      const session = await open();
      session.start();
      socket.failWrites(new Error('EPIPE'));

      session.enqueue(frame('a'));
      await waitFor(() => onStale.mock.calls.length > 0);
      await sleep(20);

      expect(onStale).toHaveBeenCalledTimes(1);
      expect(session.isStale).toBe(true);
      expect(session.enqueue(frame('b'))).toBe(false);
    });

    it('should go stale on a write timeout by default', async () => {
      const session = await open(makeSettings({ writeTimeoutMs: 20 }));
      session.start();
      socket.stall();

      session.enqueue(frame('a'));

      await waitFor(() => onStale.mock.calls.length === 1);
      expect(socket.destroyed).toBe(true);
    });

    it('should drop frames while a timed-out write is still pending', async () => {
      const session = await open(
        makeSettings({ writeTimeoutMs: 20, closeOnWriteTimeout: false }),
      );
      session.start();
      socket.stall();

      // Times out but stays on the socket until the peer drains
      session.enqueue(frame('a'));
      await sleep(40);

      for (let i = 0; i < 5; i++) {
        session.enqueue(frame(`dropped-${i}`));
        await sleep(10);
      }

      expect(socket.writableLength).toBe(frame('a').length);

      socket.release();
      session.enqueue(frame('b'));

      await waitFor(() => socket.body.toString() === 'data: a\n\ndata: b\n\n');
      await sleep(20);

      expect(socket.body.toString()).toBe('data: a\n\ndata: b\n\n');
      expect(onStale).not.toHaveBeenCalled();
      expect(session.isStale).toBe(false);
    });

    it('should go stale as soon as the peer hangs up', async () => {
      const session = await open();
      session.start();

      socket.hangUp();

      await waitFor(() => onStale.mock.calls.length === 1);
      expect(session.isStale).toBe(true);
    });

    it('should not report a graceful close as stale', async () => {
      const session = await open();
      session.start();

      session.closeQueue();
      await session.whenClosed();
      await waitFor(() => socket.destroyed);
      await sleep(10);

      expect(onStale).not.toHaveBeenCalled();
    });
  });
});
