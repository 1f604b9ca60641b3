import { describe, it, expect } from 'vitest';
import { SessionGateway } from '../services/session-gateway';
import { ConnectionError, ExecutionError } from '../utils/errors';
import { Credentials } from '../types';
import { FakeTransport, FakeTransportSession } from './helpers/fakes';

const credentials: Credentials = {
  host: '10.0.0.1',
  port: 22,
  username: 'admin',
  password: 'test-secret',
  privilegedSecret: 'test-secret',
};

describe('SessionGateway', () => {
  it('opens a session through the transport', async () => {
    const transport = new FakeTransport();
    const gateway = new SessionGateway(transport);

    const session = await gateway.open(credentials);

    expect(session.host).toBe('10.0.0.1');
    expect(transport.opened).toEqual([credentials]);
    expect(gateway.isOpen(session)).toBe(true);
  });

  it('wraps transport failures in ConnectionError with host and cause', async () => {
    const gateway = new SessionGateway(new FakeTransport(undefined, new Error('All configured authentication methods failed')));

    const error = await gateway.open(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof ConnectionError && error.host).toBe('10.0.0.1');
    expect(error instanceof ConnectionError && error.message)
      .toBe('Error connecting to device 10.0.0.1: All configured authentication methods failed');
  });

  it('applies the full list as one config set', async () => {
    const transportSession = new FakeTransportSession();
    const gateway = new SessionGateway(new FakeTransport(transportSession));
    const session = await gateway.open(credentials);

    const output = await gateway.apply(session, ['interface Gi0/1', 'no shutdown']);

    expect(output).toBe('configure terminal\ninterface Gi0/1\nno shutdown\nend');
    expect(transportSession.configSets).toEqual([['interface Gi0/1', 'no shutdown']]);
  });

  it('wraps apply failures in ExecutionError without retrying', async () => {
    const transportSession = new FakeTransportSession({ failConfig: true });
    const gateway = new SessionGateway(new FakeTransport(transportSession));
    const session = await gateway.open(credentials);

    await expect(gateway.apply(session, ['shutdown'])).rejects.toThrow(
      'Error sending configuration to 10.0.0.1: Channel reset'
    );
    expect(transportSession.configSets).toHaveLength(1);
  });

  it('runs single queries', async () => {
    const transportSession = new FakeTransportSession();
    const gateway = new SessionGateway(new FakeTransport(transportSession));
    const session = await gateway.open(credentials);

    expect(await gateway.read(session, 'show ip interface brief')).toBe('output of show ip interface brief');
  });

  it('closes idempotently and never throws', async () => {
    const transportSession = new FakeTransportSession({ failClose: true });
    const gateway = new SessionGateway(new FakeTransport(transportSession));
    const session = await gateway.open(credentials);

    await expect(gateway.close(session)).resolves.toBeUndefined();
    await expect(gateway.close(session)).resolves.toBeUndefined();

    expect(transportSession.closeCalls).toBe(1);
    expect(gateway.openSessionCount).toBe(0);
  });

  it('rejects use of a closed session', async () => {
    const gateway = new SessionGateway(new FakeTransport());
    const session = await gateway.open(credentials);
    await gateway.close(session);

    await expect(gateway.apply(session, ['shutdown'])).rejects.toBeInstanceOf(ExecutionError);
  });

  it('closes scoped sessions on every exit path', async () => {
    const transportSession = new FakeTransportSession();
    const gateway = new SessionGateway(new FakeTransport(transportSession));

    await expect(gateway.withSession(credentials, async () => {
      throw new Error('unexpected');
    })).rejects.toThrow('unexpected');

    const result = await gateway.withSession(credentials, session => gateway.read(session, 'show version'));

    expect(result).toBe('output of show version');
    expect(transportSession.closeCalls).toBe(2);
    expect(gateway.openSessionCount).toBe(0);
  });
});
