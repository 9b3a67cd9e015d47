import type { Message } from '@ramses-link/core';
import { GracefulExit, MessageProtocol, MessageTransport, TransportClosedError } from '@ramses-link/core';
import { FakeCommand, FakeGateway, FakePacket, RecordingSink, flush } from './src/fakes.js';

type Handler = (msg: Message<FakePacket>) => void | Promise<void>;

function setup(handler: Handler = () => { }) {
  const gwy = new FakeGateway();
  const protocol = new MessageProtocol<FakeCommand, FakePacket>(handler, gwy);
  const transport = new MessageTransport<FakeCommand, FakePacket>(gwy, protocol);
  const sink = new RecordingSink();
  transport.setDispatcher(sink.send);
  return { gwy, protocol, transport, sink };
}

test('inbound messages reach the handler in arrival order', async () => {
  const seen: string[] = [];
  const { protocol, transport } = setup((msg) => { seen.push(msg.header); });

  transport.pktReceiver(new FakePacket('A'));
  transport.pktReceiver(new FakePacket('B'));
  transport.pktReceiver(new FakePacket('C'));
  await protocol.drained();

  expect(seen).toEqual(['A', 'B', 'C']);
});

test('async handlers run one at a time', async () => {
  const log: string[] = [];
  const { protocol, transport } = setup(async (msg) => {
    log.push(`start ${msg.header}`);
    await flush();
    log.push(`end ${msg.header}`);
  });

  transport.pktReceiver(new FakePacket('A'));
  transport.pktReceiver(new FakePacket('B'));
  await protocol.drained();

  expect(log).toEqual(['start A', 'end A', 'start B', 'end B']);
});

test('sendData writes through the transport to the dispatcher', async () => {
  const { protocol, transport, sink } = setup();

  await protocol.sendData(new FakeCommand('a', 2));
  await protocol.sendData(new FakeCommand('b', 1));
  await transport.join();

  expect(sink.sent).toEqual(['a', 'b']);
});

test('sendData waits while writing is paused and goes out on resume', async () => {
  const { protocol, transport, sink } = setup();
  protocol.pauseWriting();
  expect(protocol.isWritingPaused).toBe(true);

  let done = false;
  const pending = protocol.sendData(new FakeCommand('held', 1)).then(() => { done = true; });
  await flush();
  expect(done).toBe(false);
  expect(sink.sent).toEqual([]);

  protocol.resumeWriting();
  await pending;
  await transport.join();
  expect(sink.sent).toEqual(['held']);
});

test('sendData before connectionMade rejects', async () => {
  const protocol = new MessageProtocol<FakeCommand, FakePacket>(() => { }, new FakeGateway());
  await expect(protocol.sendData(new FakeCommand('x', 1))).rejects.toThrow(TransportClosedError);
});

test('sendData on a closed transport rejects', async () => {
  const { protocol, transport } = setup();
  transport.close();
  await expect(protocol.sendData(new FakeCommand('x', 1))).rejects.toThrow(TransportClosedError);
});

test('connection lost stops the gateway', async () => {
  const { gwy, transport } = setup();
  transport.close();
  await transport.getExtraInfo('writerTask');

  expect(gwy.stops).toEqual([undefined]);
});

test('a handler throwing GracefulExit closes the transport', async () => {
  const { gwy, protocol, transport } = setup(() => { throw new GracefulExit(); });

  transport.pktReceiver(new FakePacket('bye'));
  await protocol.drained();
  await transport.getExtraInfo('writerTask');

  expect(transport.getState()).toBe('closed');
  expect(gwy.stops).toHaveLength(1);
});

test('other handler failures are logged and delivery continues', async () => {
  const warn = jest.spyOn(console, 'warn').mockImplementation(() => { });
  const seen: string[] = [];
  const { protocol, transport } = setup((msg) => {
    if (msg.header === 'bad') throw new Error('handler bug');
    seen.push(msg.header);
  });

  transport.pktReceiver(new FakePacket('bad'));
  transport.pktReceiver(new FakePacket('good'));
  await protocol.drained();
  await flush();

  expect(seen).toEqual(['good']);
  expect(warn).toHaveBeenCalledTimes(1);
  expect(transport.isClosing()).toBe(false);
  warn.mockRestore();
});

test('writers held by the high-water mark fail once the transport aborts', async () => {
  const gwy = new FakeGateway();
  const protocol = new MessageProtocol<FakeCommand, FakePacket>(() => { }, gwy);
  const transport = new MessageTransport<FakeCommand, FakePacket>(gwy, protocol, { highWaterMark: 2 });
  const sink = new RecordingSink(true);
  transport.setDispatcher(sink.send);

  transport.writeMany([new FakeCommand('a', 1), new FakeCommand('b', 1), new FakeCommand('c', 1)]);
  expect(protocol.isWritingPaused).toBe(true);
  const held = protocol.sendData(new FakeCommand('held', 1));

  transport.abort();
  await expect(held).rejects.toThrow(TransportClosedError);
  expect(protocol.isWritingPaused).toBe(false);

  await transport.getExtraInfo('writerTask');
  expect(sink.sent).toEqual([]);
  expect(gwy.stops).toEqual([undefined]);
});

test('the gateway is stopped only after pending messages are handled', async () => {
  const handled: string[] = [];
  let finish = () => { };
  const { gwy, protocol, transport } = setup(async (msg) => {
    await new Promise<void>((resolve) => { finish = resolve; });
    handled.push(msg.header);
  });

  transport.pktReceiver(new FakePacket('late'));
  transport.close();
  await transport.getExtraInfo('writerTask');
  expect(gwy.stops).toEqual([]);

  finish();
  await protocol.drained();
  await flush();
  expect(handled).toEqual(['late']);
  expect(gwy.stops).toEqual([undefined]);
});
