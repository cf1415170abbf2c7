/**
 * Unit Tests - TrackingClient Module
 *
 * Tests for buffering, batch flushing, task settlement and delegate callbacks.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTrackingClient, type TrackingClient } from '../../modules/trackingClient';
import type { Transport, SendMode } from '../../modules/transport';
import type { WireEvent } from '../../modules/eventTransformer';
import { TrackingTask } from '../../core/trackingTask';
import { buildNamed } from '../../core/event';
import { SystemError } from '../../errors/errorTypes';
import type { TrackerDelegate } from '../../types/delegate';
import type { EventValues } from '../../types/events';
import type { Logger } from '../../utils/logger';

describe('TrackingClient', () => {
  let sendBatch: ReturnType<typeof createSendBatch>;
  let transport: Transport;
  let mockLogger: Logger;
  let client: TrackingClient | null;

  function createSendBatch() {
    return vi.fn(async (_events: WireEvent[], _mode?: SendMode) => {});
  }

  const createTask = (name = 'purchase', values: EventValues = {}) =>
    new TrackingTask({ event: buildNamed(name, values), visitorId: 'visitor-1' });

  const createClient = (options: { batchSize?: number; maxBufferSize?: number; delegate?: TrackerDelegate } = {}) => {
    client = createTrackingClient({
      transport,
      logger: mockLogger,
      delegate: options.delegate,
      config: {
        eventBatchSize: options.batchSize ?? 2,
        maxBufferSize: options.maxBufferSize ?? 100,
        maxFlushIntervalMs: 1000,
      },
    });
    return client;
  };

  beforeEach(() => {
    sendBatch = createSendBatch();
    transport = { sendBatch };
    mockLogger = {
      logDebug: vi.fn(),
      logInfo: vi.fn(),
      logWarn: vi.fn(),
      logError: vi.fn(),
    };
    client = null;
  });

  afterEach(() => {
    client?.destroy();
    vi.useRealTimers();
  });

  describe('track', () => {
    it('should buffer tasks until the batch size is reached', () => {
      const trackingClient = createClient();
      const first = createTask();

      trackingClient.track(first);

      expect(sendBatch).not.toHaveBeenCalled();
      expect(first.state).toBe('pending');
    });

    it('should send a batch once the batch size is reached', async () => {
      const trackingClient = createClient();
      const first = createTask('purchase');
      const second = createTask('signup');

      trackingClient.track(first);
      trackingClient.track(second);

      expect(sendBatch).toHaveBeenCalledTimes(1);
      const [events, mode] = sendBatch.mock.calls[0];
      expect(events.map((event) => event.event_name)).toEqual(['purchase', 'signup']);
      expect(events.map((event) => event.event_id)).toEqual([first.id, second.id]);
      expect(mode).toBe('normal');

      await expect(first.completion).resolves.toBe(true);
      await expect(second.completion).resolves.toBe(true);
    });

    it('should drop the oldest task when the buffer overflows', async () => {
      const trackingClient = createClient({ batchSize: 10, maxBufferSize: 2 });
      const oldest = createTask('first');

      trackingClient.track(oldest);
      trackingClient.track(createTask('second'));
      trackingClient.track(createTask('third'));

      expect(oldest.state).toBe('failed');
      expect(oldest.error).toBeInstanceOf(SystemError);
      expect(oldest.error).toMatchObject({ code: 'TASK_DROPPED' });
      await expect(oldest.completion).resolves.toBe(false);
    });

    it('should fail tasks tracked after destroy', () => {
      const trackingClient = createClient();
      trackingClient.destroy();

      const task = createTask();
      trackingClient.track(task);

      expect(task.state).toBe('failed');
      expect(task.error).toMatchObject({ code: 'CLIENT_DESTROYED' });
      expect(sendBatch).not.toHaveBeenCalled();
    });
  });

  describe('flush', () => {
    it('should mark tasks as sending while the batch is in flight', async () => {
      const trackingClient = createClient({ batchSize: 10 });
      const task = createTask();
      trackingClient.track(task);

      const flushing = trackingClient.flush(true);
      expect(task.state).toBe('sending');

      await flushing;
      expect(task.state).toBe('succeeded');
    });

    it('should not send without force before the interval elapses', async () => {
      const trackingClient = createClient({ batchSize: 10 });
      trackingClient.track(createTask());

      await trackingClient.flush();

      expect(sendBatch).not.toHaveBeenCalled();
    });

    it('should do nothing with an empty buffer', async () => {
      const trackingClient = createClient();

      await trackingClient.flush(true);

      expect(sendBatch).not.toHaveBeenCalled();
    });

    it('should fail every task of a rejected batch', async () => {
      const error = new Error('offline');
      sendBatch.mockRejectedValueOnce(error);
      const trackingClient = createClient({ batchSize: 10 });
      const first = createTask('purchase');
      const second = createTask('signup');
      trackingClient.track(first);
      trackingClient.track(second);

      await trackingClient.flush(true);

      expect(first.state).toBe('failed');
      expect(first.error).toBe(error);
      expect(second.state).toBe('failed');
      await expect(second.completion).resolves.toBe(false);
    });

    it('should send tasks that arrive during a forced flush in a further batch', async () => {
      const trackingClient = createClient({ batchSize: 2 });
      const tasks = [createTask('first'), createTask('second'), createTask('third')];

      tasks.forEach((task) => trackingClient.track(task));
      await Promise.all(tasks.map((task) => task.completion));

      expect(sendBatch).toHaveBeenCalledTimes(2);
      expect(sendBatch.mock.calls[1][0].map((event) => event.event_name)).toEqual(['third']);
      expect(tasks.every((task) => task.state === 'succeeded')).toBe(true);
    });
  });

  describe('delegate', () => {
    it('should notify the delegate when a task is sent', async () => {
      const delegate = { trackingTaskDidSend: vi.fn(), trackingTaskDidFail: vi.fn() };
      const trackingClient = createClient({ batchSize: 10, delegate });
      const task = createTask();
      trackingClient.track(task);

      await trackingClient.flush(true);

      expect(delegate.trackingTaskDidSend).toHaveBeenCalledWith(task);
      expect(delegate.trackingTaskDidFail).not.toHaveBeenCalled();
    });

    it('should notify the delegate when a task fails', async () => {
      const error = new Error('offline');
      sendBatch.mockRejectedValueOnce(error);
      const delegate = { trackingTaskDidSend: vi.fn(), trackingTaskDidFail: vi.fn() };
      const trackingClient = createClient({ batchSize: 10, delegate });
      const task = createTask();
      trackingClient.track(task);

      await trackingClient.flush(true);

      expect(delegate.trackingTaskDidFail).toHaveBeenCalledWith(task, error);
      expect(delegate.trackingTaskDidSend).not.toHaveBeenCalled();
    });

    it('should send intercepted values', async () => {
      const delegate: TrackerDelegate = {
        intercept: (values) => ({ ...values, plan: 'pro' }),
      };
      const trackingClient = createClient({ batchSize: 10, delegate });
      trackingClient.track(createTask('purchase', { amount: 500 }));

      await trackingClient.flush(true);

      expect(sendBatch.mock.calls[0][0][0].values).toEqual({ amount: 500, plan: 'pro' });
    });

    it('should use a delegate assigned after creation', async () => {
      const trackingClient = createClient({ batchSize: 10 });
      const delegate = { trackingTaskDidSend: vi.fn() };
      trackingClient.delegate = delegate;
      const task = createTask();
      trackingClient.track(task);

      await trackingClient.flush(true);

      expect(trackingClient.delegate).toBe(delegate);
      expect(delegate.trackingTaskDidSend).toHaveBeenCalledWith(task);
    });

    it('should keep settling tasks when a delegate callback throws', async () => {
      const delegate = {
        trackingTaskDidSend: vi.fn(() => {
          throw new Error('callback failed');
        }),
      };
      const trackingClient = createClient({ batchSize: 10, delegate });
      const first = createTask();
      const second = createTask();
      trackingClient.track(first);
      trackingClient.track(second);

      await trackingClient.flush(true);

      expect(delegate.trackingTaskDidSend).toHaveBeenCalledTimes(2);
      expect(second.state).toBe('succeeded');
    });
  });

  describe('lifecycle', () => {
    it('should flush on the periodic interval', async () => {
      vi.useFakeTimers();
      const trackingClient = createClient({ batchSize: 10 });
      trackingClient.startPeriodicFlush();
      const task = createTask();
      trackingClient.track(task);

      await vi.advanceTimersByTimeAsync(1000);

      expect(sendBatch).toHaveBeenCalledTimes(1);
      await expect(task.completion).resolves.toBe(true);
    });

    it('should send tasks buffered behind an in-flight flush when destroyed', async () => {
      vi.useFakeTimers();
      let release: () => void = () => {};
      sendBatch.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      const trackingClient = createClient({ batchSize: 10 });
      trackingClient.startPeriodicFlush();
      const first = createTask('first');
      trackingClient.track(first);
      await vi.advanceTimersByTimeAsync(1000);
      expect(first.state).toBe('sending');

      const second = createTask('second');
      trackingClient.track(second);
      trackingClient.destroy();
      release();

      await expect(second.completion).resolves.toBe(true);
      expect(first.state).toBe('succeeded');
      expect(sendBatch).toHaveBeenCalledTimes(2);
      expect(sendBatch.mock.calls[1][0].map((event) => event.event_name)).toEqual(['second']);
      expect(sendBatch.mock.calls[1][1]).toBe('beacon');
    });

    it('should send buffered tasks with beacon on destroy', async () => {
      const trackingClient = createClient({ batchSize: 10 });
      const task = createTask();
      trackingClient.track(task);

      trackingClient.destroy();

      expect(sendBatch).toHaveBeenCalledTimes(1);
      expect(sendBatch.mock.calls[0][1]).toBe('beacon');
      await expect(task.completion).resolves.toBe(true);
    });
  });
});
