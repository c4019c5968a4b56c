// tests/unit/NotificationManager.test.ts

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NotificationManager } from '../../src/core/manager/NotificationManager';
import { SeenStateStore } from '../../src/core/seen/SeenStateStore';
import type { FetchResult, NotificationProvider } from '../../src/providers/types';
import type { Logger } from '../../src/observability/Logger';
import {
  FakeProvider,
  disabledMetrics,
  ids,
  makeNotification,
  silentLogger,
} from '../helpers';

class ThrowingProvider implements NotificationProvider {
  readonly name = 'Broken';
  isConfigured(): boolean {
    return true;
  }
  async fetchNotifications(): Promise<FetchResult> {
    throw new Error('socket hang up');
  }
}

describe('NotificationManager', () => {
  let logger: Logger;
  let manager: NotificationManager;

  const n1 = makeNotification({ source: 'GH', id: '1' });
  const n2 = makeNotification({ source: 'GH', id: '2' });
  const n3 = makeNotification({ source: 'GH', id: '3' });

  beforeEach(() => {
    logger = silentLogger();
    manager = new NotificationManager({ logger, metrics: disabledMetrics() });
  });

  describe('getNewNotifications', () => {
    it('should report only items added since the previous cycle', async () => {
      manager.addProvider(new FakeProvider('GH', [n1, n2], [n1, n2, n3]));

      expect(await manager.getNewNotifications()).toEqual([n1, n2]);
      expect(await manager.getNewNotifications()).toEqual([n3]);
    });

    it('should never report the same (source, id) twice', async () => {
      manager.addProvider(new FakeProvider('GH', [n1], [n1, n2], [n2, n1], [n1]));

      const reported: string[] = [];
      for (let cycle = 0; cycle < 4; cycle++) {
        reported.push(...ids(await manager.getNewNotifications()));
      }

      expect(reported).toEqual(['GH:1', 'GH:2']);
    });

    it('should treat an upstream edit of a seen item as already seen', async () => {
      const edited = makeNotification({ source: 'GH', id: '1', title: 'Renamed upstream' });
      manager.addProvider(new FakeProvider('GH', [n1], [edited]));

      await manager.getNewNotifications();

      expect(await manager.getNewNotifications()).toEqual([]);
    });

    it('should report a duplicate within one batch only once, first occurrence wins', async () => {
      const first = makeNotification({ source: 'GH', id: '1', title: 'First' });
      const second = makeNotification({ source: 'GH', id: '1', title: 'Second' });
      manager.addProvider(new FakeProvider('GH', [first, second]));

      const fresh = await manager.getNewNotifications();

      expect(fresh).toHaveLength(1);
      expect(fresh[0].title).toBe('First');
    });

    it('should not confuse equal ids from different sources', async () => {
      const github = makeNotification({ source: 'GitHub', id: '1' });
      const rss = makeNotification({ source: 'RSS', id: '1' });
      manager.addProvider(new FakeProvider('GitHub', [github]));
      manager.addProvider(new FakeProvider('RSS', [rss]));

      expect(ids(await manager.getNewNotifications())).toEqual(['GitHub:1', 'RSS:1']);
    });

    it('should return only the healthy provider results when another fails', async () => {
      const c = makeNotification({ source: 'P2', id: 'c' });
      manager.addProvider(new FakeProvider('P1', new Error('HTTP 502')));
      manager.addProvider(new FakeProvider('P2', [c]));

      expect(await manager.getNewNotifications()).toEqual([c]);
    });

    it('should isolate a provider that rejects instead of returning a result', async () => {
      const c = makeNotification({ source: 'P2', id: 'c' });
      const errorSpy = vi.spyOn(logger, 'error');
      manager.addProvider(new ThrowingProvider());
      manager.addProvider(new FakeProvider('P2', [c]));

      await expect(manager.getNewNotifications()).resolves.toEqual([c]);
      expect(errorSpy).toHaveBeenCalledWith('Provider fetch failed, skipping for this cycle', {
        provider: 'Broken',
        code: 'FETCH_FAILED',
        error: 'Provider Broken threw: socket hang up',
      });
    });

    it('should report items from a failed provider once it recovers', async () => {
      manager.addProvider(new FakeProvider('GH', new Error('down'), [n1]));

      expect(await manager.getNewNotifications()).toEqual([]);
      expect(await manager.getNewNotifications()).toEqual([n1]);
    });

    it('should give up on a provider that exceeds the timeout', async () => {
      manager = new NotificationManager({ logger, metrics: disabledMetrics(), providerTimeoutMs: 20 });
      const errorSpy = vi.spyOn(logger, 'error');
      const hanging = new FakeProvider('Hanging', () => new Promise<FetchResult>(() => undefined));
      manager.addProvider(hanging);
      manager.addProvider(new FakeProvider('GH', [n1]));

      expect(await manager.getNewNotifications()).toEqual([n1]);
      expect(errorSpy).toHaveBeenCalledWith('Provider fetch failed, skipping for this cycle', {
        provider: 'Hanging',
        code: 'PROVIDER_TIMEOUT',
        error: 'Provider Hanging did not respond within 20ms',
      });
    });
  });

  describe('unconfigured providers', () => {
    it('should not ask an unconfigured provider to fetch', async () => {
      const unconfigured = new FakeProvider('Off', [n1]);
      unconfigured.configured = false;
      manager.addProvider(unconfigured);

      expect(await manager.getNewNotifications()).toEqual([]);
      expect(await manager.getAllNotifications()).toEqual([]);
      expect(unconfigured.calls).toBe(0);
    });

    it('should warn about an unconfigured provider only once', async () => {
      const warnSpy = vi.spyOn(logger, 'warn');
      const unconfigured = new FakeProvider('Off');
      unconfigured.configured = false;
      manager.addProvider(unconfigured);

      await manager.getNewNotifications();
      await manager.getNewNotifications();

      const skipWarnings = warnSpy.mock.calls.filter(([message]) => message === 'Provider not configured, skipping');
      expect(skipWarnings).toHaveLength(1);
    });

    it('should fetch a provider that becomes configured later', async () => {
      const provider = new FakeProvider('GH', [n1]);
      provider.configured = false;
      manager.addProvider(provider);

      await manager.getNewNotifications();
      provider.configured = true;

      expect(await manager.getNewNotifications()).toEqual([n1]);
    });
  });

  describe('getAllNotifications', () => {
    it('should concatenate providers in registration order', async () => {
      const a = makeNotification({ source: 'P1', id: 'a' });
      const b = makeNotification({ source: 'P1', id: 'b' });
      const c = makeNotification({ source: 'P2', id: 'c' });
      manager.addProvider(new FakeProvider('P1', [a, b]));
      manager.addProvider(new FakeProvider('P2', [c]));

      expect(await manager.getAllNotifications()).toEqual([a, b, c]);
    });

    it('should keep registration order when the first provider is slower', async () => {
      manager = new NotificationManager({ logger, metrics: disabledMetrics(), fetchConcurrency: 2 });
      const a = makeNotification({ source: 'P1', id: 'a' });
      const b = makeNotification({ source: 'P1', id: 'b' });
      const c = makeNotification({ source: 'P2', id: 'c' });
      const slow = new FakeProvider('P1', [a, b]);
      slow.latencyMs = 30;
      manager.addProvider(slow);
      manager.addProvider(new FakeProvider('P2', [c]));

      expect(await manager.getAllNotifications()).toEqual([a, b, c]);
    });

    it('should leave the seen-set untouched', async () => {
      manager.addProvider(new FakeProvider('GH', [n1, n2]));

      await manager.getAllNotifications();

      expect(manager.seenCount).toBe(0);
      expect(await manager.getNewNotifications()).toEqual([n1, n2]);
    });

    it('should resolve to an empty list with no providers', async () => {
      expect(await manager.getAllNotifications()).toEqual([]);
    });
  });

  describe('markAsSeen', () => {
    it('should suppress marked items from the next delta', async () => {
      manager.addProvider(new FakeProvider('GH', [n1, n2]));

      expect(manager.markAsSeen([n1, n1])).toBe(1);
      expect(manager.hasSeen(n1)).toBe(true);
      expect(await manager.getNewNotifications()).toEqual([n2]);
    });
  });

  describe('seen state persistence', () => {
    it('should restore ids persisted by an earlier instance', async () => {
      const store = new SeenStateStore({ backend: 'memory' }, logger);

      const first = new NotificationManager({ logger, metrics: disabledMetrics(), seenStore: store });
      first.addProvider(new FakeProvider('GH', [n1, n2]));
      await first.getNewNotifications();

      const second = new NotificationManager({ logger, metrics: disabledMetrics(), seenStore: store });
      second.addProvider(new FakeProvider('GH', [n1, n2, n3]));

      expect(await second.restoreSeenState()).toBe(2);
      expect(await second.getNewNotifications()).toEqual([n3]);
      expect(await store.load('GH')).toEqual(['1', '2', '3']);
    });

    it('should still return the delta when persisting fails', async () => {
      const store = new SeenStateStore({ backend: 'memory' }, logger);
      vi.spyOn(store, 'append').mockRejectedValue(new Error('store offline'));
      const errorSpy = vi.spyOn(logger, 'error');

      manager = new NotificationManager({ logger, metrics: disabledMetrics(), seenStore: store });
      manager.addProvider(new FakeProvider('GH', [n1]));

      expect(await manager.getNewNotifications()).toEqual([n1]);
      expect(errorSpy).toHaveBeenCalledWith('Failed to persist seen state', {
        source: 'GH',
        error: 'store offline',
      });
    });

    it('should restore nothing without a store', async () => {
      expect(await manager.restoreSeenState()).toBe(0);
    });
  });
});
