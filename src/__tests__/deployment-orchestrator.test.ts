import { describe, it, expect } from 'vitest';
import { DeploymentOrchestrator, INTERFACE_BRIEF_COMMAND } from '../services/deployment-orchestrator';
import { SessionGateway } from '../services/session-gateway';
import { DeploymentState } from '../types';
import { ConnectionError } from '../utils/errors';
import { FakeGateway, FakeTransport, FakeTransportSession, makeDevice } from './helpers/fakes';

describe('DeploymentOrchestrator', () => {
  const device = makeDevice('R1');
  const commands = ['interface Gi0/1', 'ip address 10.0.0.1 255.255.255.0', 'no shutdown'];

  it('reports success with the device output', async () => {
    const gateway = new FakeGateway({ output: 'R1(config-if)#no shutdown' });
    const orchestrator = new DeploymentOrchestrator(gateway);

    const result = await orchestrator.deploy(device, commands);

    expect(result).toEqual({ deviceName: 'R1', succeeded: true, output: 'R1(config-if)#no shutdown' });
    expect(gateway.applyCalls).toEqual([commands]);
    expect(gateway.closeCalls).toBe(1);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('builds credentials from the device record', async () => {
    const gateway = new FakeGateway();
    const orchestrator = new DeploymentOrchestrator(gateway, { sshPort: 2222 });

    await orchestrator.deploy(makeDevice('R2', { managementAddress: '10.0.0.2', secret: 'enable-secret' }), commands);

    expect(gateway.openCalls).toEqual([{
      host: '10.0.0.2',
      port: 2222,
      username: 'admin',
      password: 'enable-secret',
      privilegedSecret: 'enable-secret',
    }]);
  });

  it('never applies when open fails', async () => {
    const gateway = new FakeGateway({ failOpen: true });
    const orchestrator = new DeploymentOrchestrator(gateway);

    const result = await orchestrator.deploy(device, commands);

    expect(result.succeeded).toBe(false);
    expect(result.error).toBe('Error connecting to device 10.0.0.1: Authentication failed');
    expect(gateway.applyCalls).toHaveLength(0);
    expect(gateway.closeCalls).toBe(0);
  });

  it('still closes exactly once when apply fails', async () => {
    const gateway = new FakeGateway({ failApply: true });
    const orchestrator = new DeploymentOrchestrator(gateway);

    const result = await orchestrator.deploy(device, commands);

    expect(result).toEqual({
      deviceName: 'R1',
      succeeded: false,
      output: '',
      error: 'Error sending configuration to 10.0.0.1: Socket closed',
    });
    expect(gateway.closeCalls).toBe(1);
  });

  it('keeps the result and reaches Closed when close fails', async () => {
    const states: DeploymentState[] = [];
    const gateway = new FakeGateway({ failClose: true });
    const orchestrator = new DeploymentOrchestrator(gateway, {
      onStateChange: (_name, state) => states.push(state),
    });

    const result = await orchestrator.deploy(device, commands);

    expect(result).toEqual({ deviceName: 'R1', succeeded: true, output: 'R1(config)#end' });
    expect(gateway.closeCalls).toBe(1);
    expect(states[states.length - 1]).toBe('Closed');
  });

  it('returns interface output even when close fails', async () => {
    const orchestrator = new DeploymentOrchestrator(new FakeGateway({ failClose: true }));

    expect(await orchestrator.queryInterfaces(device)).toBe('Interface  IP-Address  OK? Method Status Protocol');
  });

  it('treats an empty command list as a successful no-op', async () => {
    const gateway = new FakeGateway();
    const orchestrator = new DeploymentOrchestrator(gateway);

    const result = await orchestrator.deploy(device, []);

    expect(result).toEqual({ deviceName: 'R1', succeeded: true, output: '' });
    expect(gateway.applyCalls).toHaveLength(0);
    expect(gateway.closeCalls).toBe(1);
  });

  it('walks the state machine and reaches Closed once', async () => {
    const seen = (options: ConstructorParameters<typeof FakeGateway>[0]) => {
      const states: DeploymentState[] = [];
      const orchestrator = new DeploymentOrchestrator(new FakeGateway(options), {
        onStateChange: (_name, state) => states.push(state),
      });
      return { states, orchestrator };
    };

    const ok = seen({});
    await ok.orchestrator.deploy(device, commands);
    expect(ok.states).toEqual(['Idle', 'Connecting', 'Connected', 'Applying', 'Applied', 'Closed']);

    const applyFailed = seen({ failApply: true });
    await applyFailed.orchestrator.deploy(device, commands);
    expect(applyFailed.states).toEqual(['Idle', 'Connecting', 'Connected', 'Applying', 'ApplyFailed', 'Closed']);

    const connectFailed = seen({ failOpen: true });
    await connectFailed.orchestrator.deploy(device, commands);
    expect(connectFailed.states).toEqual(['Idle', 'Connecting', 'ConnectFailed', 'Closed']);
  });

  it('closes the real gateway session after a transport failure', async () => {
    const transportSession = new FakeTransportSession({ failConfig: true });
    const gateway = new SessionGateway(new FakeTransport(transportSession));
    const orchestrator = new DeploymentOrchestrator(gateway);

    const result = await orchestrator.deploy(device, commands);

    expect(result.succeeded).toBe(false);
    expect(transportSession.closeCalls).toBe(1);
    expect(gateway.openSessionCount).toBe(0);
  });

  it('queries the interface summary inside a scoped session', async () => {
    const gateway = new FakeGateway();
    const orchestrator = new DeploymentOrchestrator(gateway);

    const output = await orchestrator.queryInterfaces(device);

    expect(output).toBe('Interface  IP-Address  OK? Method Status Protocol');
    expect(gateway.readCalls).toEqual([INTERFACE_BRIEF_COMMAND]);
    expect(gateway.closeCalls).toBe(1);
  });

  it('propagates connection errors from interface queries', async () => {
    const orchestrator = new DeploymentOrchestrator(new FakeGateway({ failOpen: true }));

    await expect(orchestrator.queryInterfaces(device)).rejects.toBeInstanceOf(ConnectionError);
  });
});
