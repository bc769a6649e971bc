/**
 * Event queue tests
 */

import { describe, expect, it, vi } from 'vitest';
import { EventQueue } from '../../src/app/queue';

interface TestEvent {
  type: string;
}

describe('EventQueue', () => {
  it('handles events pushed from the handler after the current one finishes', () => {
    const seen: string[] = [];
    const queue: EventQueue<TestEvent> = new EventQueue<TestEvent>(
      (event) => {
        seen.push(`start:${event.type}`);
        if (event.type === 'a') {
          queue.push({ type: 'b' });
          queue.push({ type: 'c' });
        }
        seen.push(`end:${event.type}`);
      },
      { onError: vi.fn() }
    );

    queue.push({ type: 'a' });

    expect(seen).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
    expect(queue.size).toBe(0);
  });

  it('closes and reports when the handler throws', () => {
    const onError = vi.fn();
    const handled: string[] = [];
    const failure = new Error('boom');
    const queue: EventQueue<TestEvent> = new EventQueue<TestEvent>(
      (event) => {
        handled.push(event.type);
        if (event.type === 'bad') {
          queue.push({ type: 'after' });
          throw failure;
        }
      },
      { onError }
    );

    queue.push({ type: 'bad' });
    queue.push({ type: 'ignored' });

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(failure, { type: 'bad' });
    expect(queue.closed).toBe(true);
    expect(handled).toEqual(['bad']);
  });

  it('drops queued events when closed from the handler', () => {
    const handled: string[] = [];
    const queue: EventQueue<TestEvent> = new EventQueue<TestEvent>(
      (event) => {
        handled.push(event.type);
        if (event.type === 'quit') {
          queue.push({ type: 'late' });
          queue.close();
        }
      },
      { onError: vi.fn() }
    );

    queue.push({ type: 'quit' });
    queue.push({ type: 'later' });

    expect(handled).toEqual(['quit']);
  });
});
