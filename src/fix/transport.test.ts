import { describe, it, expect, afterEach, vi } from 'vitest';
import net from 'net';
import { classifySocketError, describeOutcome, sendMessage } from './transport';

const MESSAGE = Buffer.from('8=FIX.4.2\x019=5\x0135=0\x0110=161\x01', 'ascii');
const TIMEOUTS = { connectTimeoutMs: 2000, readTimeoutMs: 2000 };

interface Counterparty {
  server: net.Server;
  port: number;
  received: () => Buffer;
  closed: Promise<void>;
}

const servers: net.Server[] = [];

/**
 * In-process counterparty on an ephemeral port. `onMessage` runs once the
 * full test message has arrived.
 */
async function listen(onMessage: (socket: net.Socket) => void = () => undefined): Promise<Counterparty> {
  const chunks: Buffer[] = [];
  let markClosed: () => void = () => undefined;
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });

  const server = net.createServer((socket) => {
    socket.on('error', () => undefined);
    socket.on('close', () => markClosed());
    socket.on('data', (chunk) => {
      chunks.push(chunk);
      if (Buffer.concat(chunks).length >= MESSAGE.length) {
        onMessage(socket);
      }
    });
  });
  servers.push(server);

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }

  return { server, port: address.port, received: () => Buffer.concat(chunks), closed };
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(() => resolve());
  });
}

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(servers.splice(0).map(closeServer));
});

describe('sendMessage', () => {
  it('writes the whole message and returns the response', async () => {
    const counterparty = await listen((socket) => socket.write('8=FIX.4.2\x0135=8\x01'));

    const outcome = await sendMessage({ host: '127.0.0.1', port: counterparty.port }, MESSAGE, TIMEOUTS);

    expect(outcome.kind).toBe('received');
    expect(outcome.kind === 'received' && outcome.data.toString('ascii')).toBe('8=FIX.4.2\x0135=8\x01');
    expect(counterparty.received().equals(MESSAGE)).toBe(true);
    await counterparty.closed;
  });

  it('reads at most maxResponseBytes', async () => {
    const counterparty = await listen((socket) => socket.write('ABCDEFGH'));

    const outcome = await sendMessage(
      { host: '127.0.0.1', port: counterparty.port },
      MESSAGE,
      { ...TIMEOUTS, maxResponseBytes: 4 }
    );

    expect(outcome.kind === 'received' && outcome.data.toString('ascii')).toBe('ABCD');
  });

  it('reports closedByPeer when the server hangs up without replying', async () => {
    const counterparty = await listen((socket) => socket.end());

    const outcome = await sendMessage({ host: '127.0.0.1', port: counterparty.port }, MESSAGE, TIMEOUTS);

    expect(outcome).toEqual({ kind: 'closedByPeer' });
  });

  it('reports timedOut when no response arrives and releases the connection', async () => {
    const counterparty = await listen();

    const outcome = await sendMessage(
      { host: '127.0.0.1', port: counterparty.port },
      MESSAGE,
      { connectTimeoutMs: 2000, readTimeoutMs: 100 }
    );

    expect(outcome).toEqual({ kind: 'timedOut' });
    expect(counterparty.received().equals(MESSAGE)).toBe(true);
    // Server side sees the client close its end
    await counterparty.closed;
  });

  it('reports refused when nothing listens on the port', async () => {
    const counterparty = await listen();
    await closeServer(counterparty.server);

    const outcome = await sendMessage({ host: '127.0.0.1', port: counterparty.port }, MESSAGE, TIMEOUTS);

    expect(outcome).toEqual({ kind: 'refused' });
  });

  it('reports ETIMEDOUT when the connection is never established', async () => {
    // Leave the socket pending forever
    vi.spyOn(net.Socket.prototype, 'connect').mockImplementation(function (this: net.Socket): net.Socket {
      return this;
    });

    const outcome = await sendMessage(
      { host: '127.0.0.1', port: 1 },
      MESSAGE,
      { connectTimeoutMs: 50, readTimeoutMs: 2000 }
    );

    expect(outcome).toEqual({
      kind: 'transportError',
      code: 'ETIMEDOUT',
      detail: 'Connection to 127.0.0.1:1 timed out after 50ms'
    });
  });

  it('reports a transportError for an unusable port instead of throwing', async () => {
    const outcome = await sendMessage({ host: '127.0.0.1', port: 70000 }, MESSAGE, TIMEOUTS);

    expect(outcome.kind).toBe('transportError');
    expect(outcome.kind === 'transportError' && outcome.code).toBe('ERR_SOCKET_BAD_PORT');
  });
});

describe('classifySocketError', () => {
  it('maps ECONNREFUSED to refused', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:1'), { code: 'ECONNREFUSED' });
    expect(classifySocketError(error)).toEqual({ kind: 'refused' });
  });

  it('keeps the code and message of other errors', () => {
    const error = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    expect(classifySocketError(error)).toEqual({
      kind: 'transportError',
      code: 'ECONNRESET',
      detail: 'read ECONNRESET'
    });
  });

  it('uses UNKNOWN when there is no code', () => {
    expect(classifySocketError(new Error('boom'))).toEqual({
      kind: 'transportError',
      code: 'UNKNOWN',
      detail: 'boom'
    });
  });
});

describe('describeOutcome', () => {
  it('describes each outcome', () => {
    expect(describeOutcome({ kind: 'received', data: Buffer.from('abc') })).toBe('Received 3 bytes');
    expect(describeOutcome({ kind: 'timedOut' })).toBe('No response (timeout), message delivered');
    expect(describeOutcome({ kind: 'closedByPeer' })).toBe('Connection closed by server');
    expect(describeOutcome({ kind: 'refused' })).toBe('Connection refused');
    expect(describeOutcome({ kind: 'transportError', code: 'EPIPE', detail: 'write EPIPE' })).toBe('EPIPE: write EPIPE');
  });
});
