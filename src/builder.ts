import {
  createConfig,
  defaultConfig,
  parseTargetList,
  TARGETS_ENV_VAR,
  type Environment,
  type VLogConfig,
} from './config/config.js';
import { installServer } from './core/registry.js';
import { VLogServer } from './core/VLogServer.js';
import type { Transport } from './transports/Transport.js';

/**
 * Fluent configuration for a vlog server.
 *
 * Targets added here replace the `VLOG` filter; call {@link Builder.targetsFromEnv}
 * to read it explicitly.
 *
 * @example
 * const port = await new Builder().port(1234).addTarget('solver').init();
 */
export class Builder {
  private portNumber = defaultConfig.port;
  private hostName = defaultConfig.host;
  private targets: string[] = [];
  private debugEnabled = defaultConfig.debug;
  private path = defaultConfig.upgradePath;
  private bufferLimit = defaultConfig.maxBufferedBytes;

  /** 0 lets the OS choose. */
  port(port: number): this {
    this.portNumber = port;
    return this;
  }

  host(host: string): this {
    this.hostName = host;
    return this;
  }

  /** Allows every target starting with `prefix`. With no targets, all are allowed. */
  addTarget(prefix: string): this {
    this.targets.push(prefix);
    return this;
  }

  targetsFromEnv(env: Environment = process.env): this {
    this.targets.push(...parseTargetList(env[TARGETS_ENV_VAR]));
    return this;
  }

  debug(enabled = true): this {
    this.debugEnabled = enabled;
    return this;
  }

  upgradePath(path: string): this {
    this.path = path;
    return this;
  }

  /** Unread bytes after which a stalled viewer is dropped. */
  maxBufferedBytes(bytes: number): this {
    this.bufferLimit = bytes;
    return this;
  }

  build(): VLogConfig {
    return createConfig({
      port: this.portNumber,
      host: this.hostName,
      targets: this.targets,
      debug: this.debugEnabled,
      upgradePath: this.path,
      maxBufferedBytes: this.bufferLimit,
    });
  }

  /**
   * Starts the process-wide server used by `emit()` and friends.
   * Resolves with the port the server listens on.
   */
  async init(transport?: Transport): Promise<number> {
    return installServer(this.build(), transport);
  }

  /** Starts a server owned by the caller, leaving the process-wide one alone. */
  async start(transport?: Transport): Promise<VLogServer> {
    const server = new VLogServer(this.build(), transport);
    await server.start();
    return server;
  }
}
