import { describe, it, expect } from 'vitest';
import { ConnectionManager } from './ConnectionManager';
import { AsyncTaskScheduler } from './Scheduler';
import type { DenoiseTransportFactory } from '../../providers/audio/transport/IDenoiseTransport';
import { ConnectionFailureError, SendFailureError } from '../../errors/DenoiseErrors';
import { FakeDenoiseTransport, FakeTransportFactory, RecordingSink, pcm, settle } from '../../test/FakeDenoiseTransport';

const URL = 'ws://denoise.test/test-key/denoise/2/16000/16000';

function createManager(transportFactory: DenoiseTransportFactory) {
  const sink = new RecordingSink();
  const manager = new ConnectionManager({
    sessionId: 'session-1',
    url: URL,
    displayUrl: 'ws://denoise.test/***/denoise/2/16000/16000',
    transportFactory,
    scheduler: new AsyncTaskScheduler(),
    sink,
    getFormat: () => ({ sampleRate: 16000, numChannels: 1 })
  });
  return { manager, sink };
}

describe('ConnectionManager', () => {
  it('connects once and treats further connects as no-ops', async () => {
    const factory = new FakeTransportFactory();
    const { manager } = createManager(factory.open);

    expect(manager.status).toBe('disconnected');
    await manager.connect();
    await manager.connect();

    expect(manager.status).toBe('connected');
    expect(factory.urls).toEqual([URL]);
  });

  it('joins a connect that is already in flight', async () => {
    const factory = new FakeTransportFactory();
    const { manager } = createManager(factory.open);

    await Promise.all([manager.connect(), manager.connect()]);
    expect(factory.transports).toHaveLength(1);
  });

  it('records a failed connect and connects afresh on the next attempt', async () => {
    const factory = new FakeTransportFactory();
    factory.connectError = new Error('connection refused');
    const { manager } = createManager(factory.open);

    await expect(manager.connect()).rejects.toBeInstanceOf(ConnectionFailureError);
    expect(manager.status).toBe('failed');
    expect(manager.lastError?.message).toBe(
      'Could not connect to denoise endpoint ws://denoise.test/***/denoise/2/16000/16000: connection refused'
    );

    factory.connectError = null;
    await manager.connect();
    expect(manager.status).toBe('connected');
    expect(factory.urls).toHaveLength(2);
  });

  it('forwards received audio to the sink while connected', async () => {
    const factory = new FakeTransportFactory();
    const { manager, sink } = createManager(factory.open);
    await manager.connect();

    factory.latest.deliver(Buffer.from('denoised'));
    await settle();

    expect(sink.audio).toEqual([{ audio: Buffer.from('denoised'), sampleRate: 16000, numChannels: 1 }]);
  });

  it('disconnect cancels the pending receive and closes the transport', async () => {
    const factory = new FakeTransportFactory();
    const { manager, sink } = createManager(factory.open);
    await manager.connect();
    await settle();
    const transport = factory.latest;
    expect(transport.hasPendingReceive).toBe(true);

    await manager.disconnect();
    expect(manager.status).toBe('disconnected');
    expect(transport.hasPendingReceive).toBe(false);
    expect(transport.closeCalls).toBe(1);
    expect(sink.errors).toHaveLength(0);

    await manager.disconnect();
    expect(transport.closeCalls).toBe(1);
  });

  it('can send and receive again after disconnect and connect', async () => {
    const factory = new FakeTransportFactory();
    const { manager, sink } = createManager(factory.open);
    await manager.connect();
    await manager.disconnect();
    await manager.connect();

    await manager.send(pcm(10));
    factory.latest.deliver(Buffer.from('again'));
    await settle();

    expect(factory.transports).toHaveLength(2);
    expect(factory.transports[1].sent).toEqual([pcm(10)]);
    expect(sink.audio.map((unit) => unit.audio.toString())).toEqual(['again']);
    expect(manager.bytesSent).toBe(10);
  });

  it('refuses to send while disconnected', async () => {
    const factory = new FakeTransportFactory();
    const { manager } = createManager(factory.open);

    await expect(manager.send(pcm(10))).rejects.toThrow('Cannot send while disconnected');
    expect(factory.urls).toHaveLength(0);
  });

  it('drops the connection when a write fails', async () => {
    const factory = new FakeTransportFactory();
    const { manager } = createManager(factory.open);
    await manager.connect();
    factory.latest.sendError = new Error('broken pipe');

    const sending = manager.send(pcm(10));
    await expect(sending).rejects.toBeInstanceOf(SendFailureError);
    await expect(sending).rejects.toThrow('Sending audio to denoise endpoint failed: broken pipe');
    expect(manager.status).toBe('disconnected');
    expect(factory.latest.closeCalls).toBe(1);
  });

  it('drops the connection when the remote closes it', async () => {
    const factory = new FakeTransportFactory();
    const { manager } = createManager(factory.open);
    await manager.connect();

    factory.latest.remoteClose();
    await settle();
    expect(manager.status).toBe('disconnected');

    await manager.connect();
    expect(factory.transports).toHaveLength(2);
  });

  it('closes a transport whose handshake completes after disconnect', async () => {
    const late = new FakeDenoiseTransport(URL);
    const gate: { release?: (transport: FakeDenoiseTransport) => void } = {};
    const { manager } = createManager(
      () =>
        new Promise<FakeDenoiseTransport>((resolve) => {
          gate.release = resolve;
        })
    );

    const connecting = manager.connect();
    await settle();
    expect(manager.status).toBe('connecting');

    await manager.disconnect();
    gate.release?.(late);
    await connecting;

    expect(manager.status).toBe('disconnected');
    expect(late.closeCalls).toBe(1);
  });
});
