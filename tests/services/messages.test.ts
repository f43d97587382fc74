import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MessagePublisher, MessageSubscriber } from '../../src/services/messages.js';
import { createMessage, decodeMessage, encode } from '../../src/lib/codec.js';
import type { Message } from '../../src/types/message.js';
import { MemoryTransport } from '../helpers/memory-transport.js';

const SUBJECT = 'messages';

describe('MessagePublisher', () => {
  let transport: MemoryTransport;
  let publisher: MessagePublisher;

  beforeEach(() => {
    transport = new MemoryTransport();
    publisher = new MessagePublisher(transport, {
      subject: SUBJECT,
      intervalMs: 1000,
      metadata: { environment: 'test' },
    });
  });

  afterEach(() => {
    publisher.stop();
  });

  it('should publish numbered messages with metadata', () => {
    publisher.publishNext();
    publisher.publishNext();

    expect(transport.published).toHaveLength(2);
    const second = decodeMessage(transport.published[1].data);
    expect(transport.published[1].subject).toBe(SUBJECT);
    expect(second.subject).toBe(SUBJECT);
    expect(second.body).toBe('Message #2');
    expect(second.metadata.environment).toBe('test');
    expect(second.metadata.publisher).toBe('token-gateway');
  });

  it('should return null when the transport is closed', async () => {
    await transport.close();

    expect(publisher.publishNext()).toBeNull();
    expect(transport.published).toHaveLength(0);
  });

  describe('interval', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should publish once per interval until stopped', () => {
      publisher.start();
      publisher.start();

      vi.advanceTimersByTime(3000);
      expect(transport.published).toHaveLength(3);

      publisher.stop();
      vi.advanceTimersByTime(3000);
      expect(transport.published).toHaveLength(3);
      expect(publisher.isRunning()).toBe(false);
    });
  });
});

describe('MessageSubscriber', () => {
  let transport: MemoryTransport;

  beforeEach(() => {
    transport = new MemoryTransport();
  });

  it('should receive published messages', async () => {
    const received: Message[] = [];
    const subscriber = new MessageSubscriber(transport, { subject: SUBJECT }, (m) => received.push(m));
    subscriber.start();

    const message = createMessage(SUBJECT, 'hello', { source: 'test' });
    transport.publish(SUBJECT, encode(message));

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0]).toEqual(message);
    expect(subscriber.receivedCount()).toBe(1);
  });

  it('should drop malformed messages', async () => {
    const received: Message[] = [];
    const subscriber = new MessageSubscriber(transport, { subject: SUBJECT }, (m) => received.push(m));
    subscriber.start();

    transport.publish(SUBJECT, 'not json');
    transport.publish(SUBJECT, encode(createMessage(SUBJECT, 'ok')));

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0].body).toBe('ok');
    expect(transport.handlerErrors).toHaveLength(0);
  });

  it('should deliver each message to one member of a queue group', async () => {
    const counts = [0, 0];
    const members = counts.map(
      (_, i) => new MessageSubscriber(transport, { subject: SUBJECT, queue: 'readers' }, () => counts[i]++)
    );
    members.forEach((m) => m.start());

    for (let i = 0; i < 4; i++) {
      transport.publish(SUBJECT, encode(createMessage(SUBJECT, `m${i}`)));
    }

    await vi.waitFor(() => expect(counts[0] + counts[1]).toBe(4));
    expect(counts).toEqual([2, 2]);
  });

  it('should deliver to every plain subscriber', async () => {
    let total = 0;
    new MessageSubscriber(transport, { subject: SUBJECT }, () => total++).start();
    new MessageSubscriber(transport, { subject: SUBJECT }, () => total++).start();

    transport.publish(SUBJECT, encode(createMessage(SUBJECT, 'fan-out')));

    await vi.waitFor(() => expect(total).toBe(2));
  });

  it('should stop listening', () => {
    const subscriber = new MessageSubscriber(transport, { subject: SUBJECT });
    subscriber.start();
    subscriber.start();
    expect(transport.listenerCount(SUBJECT)).toBe(1);

    subscriber.stop();
    expect(subscriber.isRunning()).toBe(false);
    expect(transport.listenerCount(SUBJECT)).toBe(0);
  });
});
