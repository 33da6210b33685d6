import { afterEach, describe, expect, test } from 'vitest';
import { Builder } from '../src/builder.js';
import { RegistryError } from '../src/core/errors.js';
import { clear, currentServer, emit, init, initPort, isEnabled, shutdown, waitForConnection } from '../src/vlog.js';
import { MockConnection, MockTransport, payloadText, upgradeRequest } from './helpers/mocks.js';

describe('process-wide API', () => {
  afterEach(() => {
    shutdown();
  });

  test('waitForConnection before init fails immediately', async () => {
    const err = await waitForConnection().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RegistryError);
    expect(err).toMatchObject({ code: 'NOT_INITIALIZED' });
  });

  test('emit and clear without a server do nothing', () => {
    expect(() => emit('t', 's', 'c')).not.toThrow();
    expect(() => clear('s')).not.toThrow();
    expect(isEnabled('t')).toBe(false);
  });

  test('forwards to the installed server', async () => {
    const transport = new MockTransport();
    await new Builder().addTarget('custom_target_2').init(transport);

    const waiting = waitForConnection();
    const viewer = new MockConnection();
    transport.simulateConnection(viewer);
    viewer.receive(upgradeRequest());
    await waiting;

    expect(isEnabled('custom_target_2::submodule')).toBe(true);
    expect(isEnabled('custom_target_1')).toBe(false);

    emit('custom_target_1', 'surface', 'First message');
    emit('custom_target_2', 'surface', 'Second message');
    clear('surface');

    expect(viewer.framesFrom(1).map(payloadText)).toEqual([
      '{"surf":"surface","content":"Second message"}',
      '{"clear":1,"surf":"surface"}',
    ]);
  });

  test('a failed bind leaves nothing installed', async () => {
    const failing = new MockTransport();
    failing.listenMock.mockRejectedValueOnce(new Error('listen EACCES'));

    await expect(new Builder().port(80).init(failing)).rejects.toMatchObject({ code: 'LISTEN_FAILED' });
    expect(currentServer()).toBeNull();
    await expect(new Builder().init(new MockTransport())).resolves.toBe(40000);
  });

  test('shutdown uninstalls the server and releases waiters', async () => {
    await new Builder().init(new MockTransport());
    const waiting = waitForConnection();

    shutdown();
    await expect(waiting).rejects.toMatchObject({ code: 'SHUT_DOWN' });
    expect(currentServer()).toBeNull();
    await expect(waitForConnection()).rejects.toMatchObject({ code: 'NOT_INITIALIZED' });
  });

  test('init reads the target filter from the environment', async () => {
    const port = await init({ VLOG: 'custom_target_1, custom_target_2' });

    expect(port).toBeGreaterThan(0);
    expect(currentServer()?.filter.rules).toEqual(['custom_target_1', 'custom_target_2']);
    expect(isEnabled('custom_target_2::submodule')).toBe(true);
    expect(isEnabled('other')).toBe(false);
  });

  test('initPort does not filter targets', async () => {
    const port = await initPort(0);

    expect(port).toBeGreaterThan(0);
    expect(currentServer()?.port).toBe(port);
    expect(isEnabled('anything')).toBe(true);
  });

  test('a second init fails loudly', async () => {
    await initPort(0);
    await expect(init({})).rejects.toMatchObject({ code: 'ALREADY_INITIALIZED' });
  });
});
