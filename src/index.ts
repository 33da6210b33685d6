export * from './config/config.js';
export * from './core/errors.js';
export * from './core/frame.js';
export * from './core/handshake.js';
export * from './core/message.js';
export * from './core/target-filter.js';
export * from './core/VLogServer.js';
export * from './transports/Transport.js';
export * from './transports/TcpTransport.js';
export { renderBootstrapPage } from './core/bootstrap-page.js';
export { Builder } from './builder.js';
export { init, initPort, waitForConnection, emit, clear, isEnabled, shutdown, currentServer } from './vlog.js';
