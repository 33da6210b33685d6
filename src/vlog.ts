/**
 * Process-wide entry points. They all forward to the one server installed by
 * {@link init}, {@link initPort} or `Builder.init()`.
 *
 * @example
 * const port = await init();
 * console.log(`Open http://localhost:${port}/`);
 * await waitForConnection();
 * emit('solver::step', 'main', 'First message');
 */
import { configFromEnvironment, type Environment } from './config/config.js';
import { RegistryError } from './core/errors.js';
import type { VLogContent } from './core/message.js';
import { currentServer, installServer, uninstallServer } from './core/registry.js';
import { Builder } from './builder.js';

/**
 * Starts the vlog server on an OS assigned port with the target filter read
 * from `VLOG`. Resolves with the port.
 */
export async function init(env: Environment = process.env): Promise<number> {
  return installServer(configFromEnvironment(env));
}

/** Starts the vlog server on `port` (0 for any) without filtering targets. */
export function initPort(port: number): Promise<number> {
  return new Builder().port(port).init();
}

/**
 * Resolves once a browser is attached. Rejects with NOT_INITIALIZED when no
 * server has been started.
 */
export function waitForConnection(): Promise<void> {
  const server = currentServer();
  if (!server) {
    return Promise.reject(new RegistryError('waitForConnection() called before init()', 'NOT_INITIALIZED'));
  }
  return server.waitForConnection();
}

export function emit(target: string, surface: string, content: VLogContent): void {
  currentServer()?.emit(target, surface, content);
}

export function clear(surface: string): void {
  currentServer()?.clear(surface);
}

/** False while no server is installed, since nothing would be delivered. */
export function isEnabled(target: string): boolean {
  return currentServer()?.isEnabled(target) ?? false;
}

export function shutdown(): void {
  uninstallServer();
}

export { currentServer };
