import { describe, test, expect, beforeEach } from 'vitest';
import { UtteranceQueueManager } from '@/services/narration/UtteranceQueueManager';
import { measurePerformance } from '@/services/narration/utterance';
import { QueuePriority, Utterance } from '@/services/narration/types';
import { makeInterjection, makeUtterance } from './helpers';

const recycle = (queue: UtteranceQueueManager, utterance: Utterance, seconds: number) =>
  queue.moveToRecycle(utterance, measurePerformance(utterance, seconds, 0));

describe('UtteranceQueueManager', () => {
  let queue: UtteranceQueueManager;

  beforeEach(() => {
    queue = new UtteranceQueueManager();
  });

  describe('main queue', () => {
    test('should dequeue in insertion order', () => {
      const a = makeUtterance(0, 10);
      const b = makeUtterance(10, 20);
      queue.enqueue(a);
      queue.enqueue(b);

      expect(queue.queueDepth).toBe(2);
      expect(queue.peekNext()).toBe(a);
      expect(queue.dequeueNext()).toBe(a);
      expect(queue.dequeueNext()).toBe(b);
      expect(queue.dequeueNext()).toBeNull();
      expect(queue.isMainQueueEmpty).toBe(true);
    });

    test('should let an interjection preempt pending content', () => {
      const a = makeUtterance(0, 10);
      const b = makeUtterance(10, 20);
      const note = makeInterjection(0);
      queue.enqueueMany([a, b]);
      queue.insertAtFront(note);

      expect(queue.dequeueNext()).toBe(note);
      expect(queue.dequeueNext()).toBe(a);
      expect(queue.dequeueNext()).toBe(b);
    });

    test('should let urgent items preempt, latest first', () => {
      const a = makeUtterance(0, 10);
      const b = makeUtterance(10, 20);
      const earlier = makeUtterance(20, 30, { priority: QueuePriority.Urgent });
      const later = makeUtterance(30, 40, { priority: QueuePriority.Urgent });
      queue.enqueueMany([a, b]);
      queue.insertAtFront(earlier);
      queue.insertAtFront(later);

      expect(queue.dequeueNext()).toBe(later);
      expect(queue.dequeueNext()).toBe(earlier);
      expect(queue.dequeueNext()).toBe(a);
      expect(queue.dequeueNext()).toBe(b);
    });

    test('should refuse a front insert for a range already pending', () => {
      queue.enqueue(makeUtterance(0, 10));
      const copy = makeUtterance(0, 10, { priority: QueuePriority.Urgent });

      expect(queue.insertAtFront(copy)).toBe(false);
      expect(queue.queueDepth).toBe(1);
      expect(queue.peekNext()).not.toBe(copy);
    });

    test('should append a normal-priority item passed to insertAtFront', () => {
      const a = makeUtterance(0, 10);
      const b = makeUtterance(10, 20);
      queue.enqueue(a);
      queue.insertAtFront(b);

      expect(queue.dequeueNext()).toBe(a);
      expect(queue.lastQueued()).toBe(b);
    });

    test('should refuse a duplicate pending range', () => {
      expect(queue.enqueue(makeUtterance(0, 10))).toBe(true);
      expect(queue.enqueue(makeUtterance(0, 10))).toBe(false);
      expect(queue.enqueueMany([makeUtterance(0, 10), makeUtterance(10, 20)])).toBe(1);
      expect(queue.queueDepth).toBe(2);
    });

    test('should accept interjections at the same position', () => {
      queue.enqueue(makeInterjection(5, 'first'));
      queue.enqueue(makeInterjection(5, 'second'));
      expect(queue.queueDepth).toBe(2);
    });
  });

  describe('recycle buffer', () => {
    test('should attach measured performance', () => {
      const u = makeUtterance(0, 20, { text: 'twenty characters!!!' });
      recycle(queue, u, 2);

      expect(queue.recycleDepth).toBe(1);
      expect(queue.recycledPerformance()).toEqual([
        {
          id: u.id,
          startPosition: 0,
          endPosition: 20,
          isInterjection: false,
          actualDuration: 2,
          charactersPerSecond: 10,
          completedAt: 0,
        },
      ]);
    });

    test('should keep only the configured number of entries', () => {
      const small = new UtteranceQueueManager(2);
      const items = [makeUtterance(0, 1), makeUtterance(1, 2), makeUtterance(2, 3)];
      items.forEach((u) => recycle(small, u, 1));

      expect(small.recycleDepth).toBe(2);
      expect(small.recycledPerformance().map((t) => t.startPosition)).toEqual([1, 2]);
    });

    test('should find the most recent utterances covering the requested time', () => {
      const first = makeUtterance(0, 10);
      const second = makeUtterance(10, 20);
      const third = makeUtterance(20, 30);
      recycle(queue, first, 1.0);
      recycle(queue, second, 1.5);
      recycle(queue, third, 2.0);

      const replay = queue.findReplayUtterances(2.5);
      expect(replay?.map((u) => u.startPosition)).toEqual([10, 20]);
    });

    test('should return everything when history is shorter than requested', () => {
      recycle(queue, makeUtterance(0, 10), 1);
      recycle(queue, makeUtterance(10, 20), 1);
      expect(queue.findReplayUtterances(30)?.length).toBe(2);
    });

    test('should return null when nothing was recycled', () => {
      expect(queue.findReplayUtterances(5)).toBeNull();
      expect(queue.hasRecycledContent).toBe(false);
    });

    test('should return the whole history when it is shorter than the depth', () => {
      const only = makeUtterance(0, 10);
      recycle(queue, only, 1);
      recycle(queue, makeInterjection(10), 0.5);

      const context = queue.contextReplayUtterances(3);
      expect(context).toHaveLength(1);
      expect(context[0]?.id).toBe(only.id);
    });

    test('should skip interjections when picking context', () => {
      [0, 10, 20, 30].forEach((start) => recycle(queue, makeUtterance(start, start + 10), 1));
      recycle(queue, makeInterjection(40), 0.5);

      expect(queue.lastMainContentUtterance()?.startPosition).toBe(30);
      expect(queue.contextReplayUtterances().map((u) => u.startPosition)).toEqual([10, 20, 30]);
      expect(queue.contextReplayUtterances(1).map((u) => u.startPosition)).toEqual([30]);
      expect(queue.contextReplayUtterances(0)).toEqual([]);
    });
  });

  describe('clearing', () => {
    test('clearMainQueue should keep recycled history', () => {
      queue.enqueue(makeUtterance(0, 10));
      recycle(queue, makeUtterance(0, 5), 1);
      queue.clearMainQueue();

      expect(queue.queueDepth).toBe(0);
      expect(queue.recycleDepth).toBe(1);
    });

    test('resetAll should drop both queues', () => {
      queue.enqueue(makeUtterance(0, 10));
      recycle(queue, makeUtterance(0, 5), 1);
      queue.resetAll();

      expect(queue.queueDepth).toBe(0);
      expect(queue.recycleDepth).toBe(0);
    });
  });
});
