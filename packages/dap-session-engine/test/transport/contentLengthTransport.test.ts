import { expect } from 'chai';
import { PassThrough } from 'stream';
import { EndOfStreamError, SessionError } from '../../src/errors';
import { ContentLengthTransport } from '../../src/transport/contentLengthTransport';
import { captureError, createMockLogger } from '../mocks/mockLogger';

function frame(body: string): string {
  return `Content-Length: ${Buffer.byteLength(body, 'utf8')}\r\n\r\n${body}`;
}

describe('ContentLengthTransport', () => {
  let stream: PassThrough;
  let transport: ContentLengthTransport;

  beforeEach(() => {
    stream = new PassThrough();
    transport = new ContentLengthTransport(stream, createMockLogger());
  });

  afterEach(() => {
    stream.destroy();
  });

  it('frames an outgoing message with its byte length', () => {
    const bytes = transport.createMessage({ a: 'é' });

    expect(bytes.toString('utf8')).to.equal('Content-Length: 10\r\n\r\n{"a":"é"}');
  });

  it('reads a message delivered across several chunks', async () => {
    const framed = frame('{"seq":1,"type":"event","event":"initialized"}');
    stream.write(framed.slice(0, 7));
    stream.write(framed.slice(7, 30));
    stream.write(framed.slice(30));

    expect(await transport.messageExists(100)).to.be.true;
    expect(transport.readMessage()).to.deep.equal({
      seq: 1,
      type: 'event',
      event: 'initialized',
    });
  });

  it('reads back-to-back messages in order', async () => {
    stream.write(frame('{"seq":1}') + frame('{"seq":2}'));

    expect(await transport.messageExists(100)).to.be.true;
    expect(transport.readMessage()).to.deep.equal({ seq: 1 });
    expect(transport.readMessage()).to.deep.equal({ seq: 2 });
  });

  it('reads what createMessage wrote', async () => {
    const message = { seq: 3, type: 'request', command: 'threads', note: 'ü' };
    stream.write(transport.createMessage(message));

    expect(await transport.messageExists(100)).to.be.true;
    expect(transport.readMessage()).to.deep.equal(message);
  });

  it('reports no message once the timeout elapses', async () => {
    expect(await transport.messageExists(5)).to.be.false;
  });

  it('waits for a message that arrives during the timeout', async () => {
    setTimeout(() => stream.write(frame('{"seq":4}')), 5);

    expect(await transport.messageExists(1000)).to.be.true;
    expect(transport.bufferedMessageCount).to.equal(1);
  });

  it('signals end of stream once buffered messages are drained', async () => {
    stream.write(frame('{"seq":5}'));
    stream.end();

    expect(await transport.messageExists(1000)).to.be.true;
    expect(transport.readMessage()).to.deep.equal({ seq: 5 });

    expect(await transport.messageExists(1000)).to.be.true;
    expect(() => transport.readMessage()).to.throw(EndOfStreamError);
  });

  it('surfaces a malformed body and keeps reading', async () => {
    stream.write(frame('{not json') + frame('{"seq":6}'));

    expect(await transport.messageExists(100)).to.be.true;
    expect(() => transport.readMessage())
      .to.throw(SessionError)
      .with.property('code', 'InvalidMessage');
    expect(transport.readMessage()).to.deep.equal({ seq: 6 });
  });

  it('surfaces a header without Content-Length', async () => {
    stream.write('X-Other: 1\r\n\r\n');

    expect(await transport.messageExists(100)).to.be.true;
    const error = await captureError(() => transport.readMessage());
    expect(error).to.be.instanceOf(SessionError);
    expect(error).to.have.property('message', 'Missing Content-Length header');
  });

  it('reports a stream error as end of stream', async () => {
    const cause = new Error('read ECONNRESET');
    stream.emit('error', cause);

    expect(await transport.messageExists(100)).to.be.true;
    const error = await captureError(() => transport.readMessage());
    expect(error).to.be.instanceOf(EndOfStreamError);
    expect(error).to.have.property('cause', cause);
    expect(() => transport.readMessage()).to.throw(EndOfStreamError);
  });

  it('fails for good on a message over the size limit', async () => {
    const small = new PassThrough();
    const limited = new ContentLengthTransport(small, createMockLogger(), 8);
    small.write(frame('{"seq":7,"padding":true}'));

    expect(await limited.messageExists(100)).to.be.true;
    expect(() => limited.readMessage())
      .to.throw(SessionError)
      .with.property('code', 'InvalidMessage');
    expect(() => limited.readMessage()).to.throw(SessionError);
    small.destroy();
  });
});
