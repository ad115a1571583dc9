/**
 * @fileoverview Tests for RootSessionManager
 *
 * Covers lazy creation, reuse per root, exit-driven eviction, exit-hook
 * ordering and the failure paths that must leave the registry untouched.
 *
 * Port: N/A (in-process transport, no server)
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { SessionConfigError, SessionStartError } from '../src/errors.js';
import { RootSessionManager, createRootSessionManager } from '../src/root-session-manager.js';
import type { SessionConfig, SessionEntryEvent } from '../src/types.js';
import { MockSessionTransport, waitForEvent, type MockSessionHandle } from './mocks/index.js';

function tsserverConfig(rootDir: string): SessionConfig {
  return { name: 'tsserver', cmd: ['tsserver', '--stdio'], settings: { root: rootDir } };
}

/** Factories written in plain JS can return anything; parse one from JSON. */
function untypedConfig(json: string): SessionConfig {
  return JSON.parse(json);
}

describe('RootSessionManager', () => {
  let transport: MockSessionTransport;
  let factory: Mock<[string], SessionConfig>;
  let manager: RootSessionManager<MockSessionHandle>;

  beforeEach(() => {
    transport = new MockSessionTransport();
    factory = vi.fn<[string], SessionConfig>(tsserverConfig);
    manager = new RootSessionManager({ factory, transport });
  });

  describe('add', () => {
    it('should start a session for a new root', () => {
      const sessionId = manager.add('/proj');

      expect(sessionId).toEqual(expect.any(String));
      expect(factory).toHaveBeenCalledTimes(1);
      expect(factory).toHaveBeenCalledWith('/proj');
      expect(manager.get('/proj')).toBe(sessionId);
      expect(manager.size).toBe(1);
    });

    it('should pass the root directory and a composed exit hook to the transport', () => {
      manager.add('/proj');

      expect(transport.started).toHaveLength(1);
      const config = transport.started[0];
      expect(config.rootDir).toBe('/proj');
      expect(config.name).toBe('tsserver');
      expect(config.cmd).toEqual(['tsserver', '--stdio']);
      expect(config.settings).toEqual({ root: '/proj' });
      expect(typeof config.onExit).toBe('function');
    });

    it('should reuse the live session without calling the factory again', () => {
      const first = manager.add('/proj');
      const second = manager.add('/proj');

      expect(second).toBe(first);
      expect(factory).toHaveBeenCalledTimes(1);
      expect(transport.started).toHaveLength(1);
    });

    it('should keep separate sessions for separate roots', () => {
      const a = manager.add('/proj-a');
      const b = manager.add('/proj-b');

      expect(a).not.toBe(b);
      expect(manager.roots()).toEqual(['/proj-a', '/proj-b']);
    });

    it.each([null, undefined, ''])('should ignore a missing root (%s)', (rootDir) => {
      expect(manager.add(rootDir)).toBeNull();
      expect(factory).not.toHaveBeenCalled();
      expect(manager.size).toBe(0);
      expect(transport.started).toHaveLength(0);
    });

    it('should deliver sessionAdded to waiting listeners', async () => {
      const added = waitForEvent(manager, 'sessionAdded');

      const sessionId = manager.add('/proj');

      await expect(added).resolves.toEqual({ rootDir: '/proj', sessionId });
    });

    it('should emit sessionAdded', () => {
      const events: SessionEntryEvent[] = [];
      manager.on('sessionAdded', (event: SessionEntryEvent) => events.push(event));

      const sessionId = manager.add('/proj');

      expect(events).toEqual([{ rootDir: '/proj', sessionId }]);
    });
  });

  describe('session exit', () => {
    it('should evict the entry and start a fresh session on the next add', () => {
      const first = manager.add('/proj');
      transport.lastFor('/proj')?.exit(0);

      expect(manager.has('/proj')).toBe(false);
      expect(manager.clients()).toEqual([]);

      const second = manager.add('/proj');
      expect(second).not.toBe(first);
      expect(factory).toHaveBeenCalledTimes(2);
    });

    it('should run cleanup before the factory exit callback, with the same arguments', () => {
      const order: string[] = [];
      const userOnExit = vi.fn((code: unknown) => {
        order.push(`user:${String(code)}:${manager.has('/proj') ? 'present' : 'absent'}`);
      });
      manager.on('sessionRemoved', () => order.push('removed'));
      factory.mockImplementation((rootDir) => ({ ...tsserverConfig(rootDir), onExit: userOnExit }));

      manager.add('/proj');
      transport.lastFor('/proj')?.exit(3);

      expect(order).toEqual(['removed', 'user:3:absent']);
      expect(userOnExit).toHaveBeenCalledWith(3);
    });

    it('should emit sessionRemoved with the exiting session', () => {
      const removed: SessionEntryEvent[] = [];
      manager.on('sessionRemoved', (event: SessionEntryEvent) => removed.push(event));

      const sessionId = manager.add('/proj');
      transport.lastFor('/proj')?.exit();

      expect(removed).toEqual([{ rootDir: '/proj', sessionId }]);
    });

    it('should deliver sessionRemoved to waiting listeners', async () => {
      const sessionId = manager.add('/proj');
      const removed = waitForEvent(manager, 'sessionRemoved');

      transport.lastFor('/proj')?.exit();

      await expect(removed).resolves.toEqual({ rootDir: '/proj', sessionId });
    });

    it('should leave other roots alone', () => {
      manager.add('/proj-a');
      const b = manager.add('/proj-b');

      transport.lastFor('/proj-a')?.exit();

      expect(manager.roots()).toEqual(['/proj-b']);
      expect(manager.get('/proj-b')).toBe(b);
    });

    it('should not evict a replacement when a stale exit arrives late', () => {
      const first = manager.add('/proj');
      const firstHandle = transport.getSessionById(first ?? '');
      if (!firstHandle) throw new Error('first session missing');

      firstHandle.exit();
      const second = manager.add('/proj');
      // A duplicate notification for the first session
      firstHandle.config.onExit(0);

      expect(manager.get('/proj')).toBe(second);
    });
  });

  describe('clients', () => {
    it('should list the live handles', () => {
      const a = manager.add('/proj-a');
      const b = manager.add('/proj-b');

      expect(manager.clients().map((handle) => handle.id)).toEqual([a, b]);
    });

    it('should omit ids the transport no longer knows', () => {
      const a = manager.add('/proj-a');
      const b = manager.add('/proj-b');

      // Session died but its exit notification has not been delivered yet
      if (a) transport.forget(a);

      expect(manager.clients().map((handle) => handle.id)).toEqual([b]);
      expect(manager.has('/proj-a')).toBe(true);
    });

    it('should resolve a single root through getHandle', () => {
      const a = manager.add('/proj-a');

      expect(manager.getHandle('/proj-a')?.id).toBe(a);
      expect(manager.getHandle('/elsewhere')).toBeUndefined();
    });
  });

  describe('failures', () => {
    it('should wrap a throwing factory and leave the registry unchanged', () => {
      factory.mockImplementation(() => {
        throw new Error('no binary');
      });

      expect(() => manager.add('/proj')).toThrow(SessionConfigError);
      expect(manager.size).toBe(0);
      expect(transport.started).toHaveLength(0);
    });

    it('should reject configs missing required fields before starting', () => {
      factory.mockImplementation(() => ({ name: '', cmd: [] }));

      let caught: unknown;
      try {
        manager.add('/proj');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(SessionConfigError);
      if (!(caught instanceof SessionConfigError)) return;
      expect(caught.rootDir).toBe('/proj');
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^name: /);
      expect(caught.issues[1]).toMatch(/^cmd: /);
      expect(manager.size).toBe(0);
      expect(transport.started).toHaveLength(0);
    });

    it('should reject a non-function onExit', () => {
      factory.mockImplementation(() =>
        untypedConfig('{"name":"tsserver","cmd":["tsserver"],"onExit":"later"}'),
      );

      expect(() => manager.add('/proj')).toThrow(/onExit: Expected a function/);
    });

    it('should pass unknown config fields through to the transport', () => {
      factory.mockImplementation((rootDir) => ({ ...tsserverConfig(rootDir), filetypes: ['typescript'] }));

      manager.add('/proj');

      expect(transport.started[0].filetypes).toEqual(['typescript']);
    });

    it('should wrap a start failure and record nothing', () => {
      const cause = new Error('spawn ENOENT');
      transport.options.failNextStart = cause;

      let caught: unknown;
      try {
        manager.add('/proj');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(SessionStartError);
      if (!(caught instanceof SessionStartError)) return;
      expect(caught.cause).toBe(cause);
      expect(caught.message).toBe('Failed to start tsserver for /proj: spawn ENOENT');
      expect(manager.has('/proj')).toBe(false);

      // The root stays usable
      expect(manager.add('/proj')).toEqual(expect.any(String));
    });

    it('should not record a session that exits before startSession returns', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const userOnExit = vi.fn();
      factory.mockImplementation((rootDir) => ({ ...tsserverConfig(rootDir), onExit: userOnExit }));
      transport.options.exitDuringStart = true;

      expect(manager.add('/proj')).toBeNull();
      expect(manager.has('/proj')).toBe(false);
      expect(userOnExit).toHaveBeenCalledWith(1);
      expect(warn).toHaveBeenCalledWith('[RootSessionManager] tsserver for /proj exited during startup');

      transport.options.exitDuringStart = false;
      expect(manager.add('/proj')).toEqual(expect.any(String));
      expect(factory).toHaveBeenCalledTimes(2);
    });
  });

  describe('debug logging', () => {
    it('should log adds and exits when enabled', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const debugManager = createRootSessionManager(tsserverConfig, transport, { debug: true });

      const sessionId = debugManager.add('/proj');
      transport.lastFor('/proj')?.exit();

      expect(log.mock.calls.map((call) => call[0])).toEqual([
        `[RootSessionManager] Started tsserver (${sessionId}) for /proj`,
        `[RootSessionManager] Session ${sessionId} for /proj exited`,
      ]);
    });

    it('should stay quiet by default', () => {
      delete process.env.ROOTBOUND_DEBUG;
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const quietManager = new RootSessionManager({ factory, transport });

      quietManager.add('/proj');
      transport.lastFor('/proj')?.exit();

      expect(log).not.toHaveBeenCalled();
    });

    it('should take the default from ROOTBOUND_DEBUG', () => {
      process.env.ROOTBOUND_DEBUG = '1';
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const envManager = new RootSessionManager({ factory, transport });

      const sessionId = envManager.add('/proj');

      expect(log).toHaveBeenCalledWith(`[RootSessionManager] Started tsserver (${sessionId}) for /proj`);
    });

    it('should take the default from injected settings', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const settingsManager = createRootSessionManager(tsserverConfig, transport, { settings: { debug: true } });

      const sessionId = settingsManager.add('/proj');

      expect(log).toHaveBeenCalledWith(`[RootSessionManager] Started tsserver (${sessionId}) for /proj`);
    });

    it('should let an explicit debug option override settings', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const explicitManager = new RootSessionManager({
        factory,
        transport,
        debug: false,
        settings: { debug: true },
      });

      explicitManager.add('/proj');

      expect(log).not.toHaveBeenCalled();
    });
  });
});
