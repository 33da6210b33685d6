import type { VLogConfig } from '../config/config.js';
import type { Transport } from '../transports/Transport.js';
import { RegistryError } from './errors.js';
import { VLogServer } from './VLogServer.js';

let installed: VLogServer | null = null;

/**
 * Creates the process-wide server and starts it. Fails with
 * ALREADY_INITIALIZED while another one is installed; a server that fails to
 * bind is uninstalled again so the call can be retried.
 */
export async function installServer(config: Partial<VLogConfig>, transport?: Transport): Promise<number> {
  if (installed) {
    throw new RegistryError('The vlog server has already been initialized', 'ALREADY_INITIALIZED');
  }
  const server = new VLogServer(config, transport);
  installed = server;
  try {
    return await server.start();
  } catch (err: unknown) {
    if (installed === server) installed = null;
    throw err;
  }
}

export function currentServer(): VLogServer | null {
  return installed;
}

/** Shuts the process-wide server down and forgets it. */
export function uninstallServer(): void {
  const server = installed;
  installed = null;
  server?.shutdown();
}
