export type { IDenoiseTransport, DenoiseTransportFactory } from './IDenoiseTransport';
export { WebSocketTransport, openWebSocketTransport } from './WebSocketTransport';
export type { WebSocketTransportOptions } from './WebSocketTransport';
