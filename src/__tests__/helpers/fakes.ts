/**
 * 테스트용 가짜 구현 (네트워크 없이 프로세스 내에서 동작)
 */

import { CommandList, Credentials, DeviceRecord } from '../../types';
import { DeviceGateway, DeviceSession, SessionTransport, TransportSession } from '../../services/session-gateway';
import { InventoryStore } from '../../services/inventory-store';
import { GenerationBackend } from '../../services/generation-client';
import { ConnectionError, ExecutionError } from '../../utils/errors';

export function makeDevice(name: string, overrides: Partial<DeviceRecord> = {}): DeviceRecord {
  return {
    name,
    managementAddress: '10.0.0.1',
    username: 'admin',
    secret: 'test-secret',
    description: 'core',
    ...overrides,
  };
}

export interface FakeGatewayOptions {
  failOpen?: boolean;
  failApply?: boolean;
  failClose?: boolean;
  output?: string;
}

export class FakeGateway implements DeviceGateway {
  openCalls: Credentials[] = [];
  applyCalls: CommandList[] = [];
  readCalls: string[] = [];
  closeCalls = 0;

  constructor(private readonly options: FakeGatewayOptions = {}) {}

  async open(credentials: Credentials): Promise<DeviceSession> {
    this.openCalls.push(credentials);
    if (this.options.failOpen) {
      throw new ConnectionError(credentials.host, 'Authentication failed');
    }
    return { id: `session-${this.openCalls.length}`, host: credentials.host, openedAt: new Date() };
  }

  async apply(session: DeviceSession, commands: CommandList): Promise<string> {
    this.applyCalls.push(commands);
    if (this.options.failApply) {
      throw new ExecutionError('Socket closed', session.host);
    }
    return this.options.output ?? 'R1(config)#end';
  }

  async read(_session: DeviceSession, query: string): Promise<string> {
    this.readCalls.push(query);
    return 'Interface  IP-Address  OK? Method Status Protocol';
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.options.failClose) {
      throw new Error('Already disconnected');
    }
  }
}

export class FakeTransportSession implements TransportSession {
  configSets: CommandList[] = [];
  commands: string[] = [];
  closeCalls = 0;

  constructor(
    private readonly behavior: { failConfig?: boolean; failClose?: boolean } = {}
  ) {}

  async sendConfigSet(commands: CommandList): Promise<string> {
    this.configSets.push(commands);
    if (this.behavior.failConfig) {
      throw new Error('Channel reset');
    }
    return `configure terminal\n${commands.join('\n')}\nend`;
  }

  async sendCommand(command: string): Promise<string> {
    this.commands.push(command);
    return `output of ${command}`;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.behavior.failClose) {
      throw new Error('Already disconnected');
    }
  }
}

export class FakeTransport implements SessionTransport {
  opened: Credentials[] = [];

  constructor(
    readonly session: FakeTransportSession = new FakeTransportSession(),
    private readonly openError?: Error
  ) {}

  async open(credentials: Credentials): Promise<TransportSession> {
    this.opened.push(credentials);
    if (this.openError) {
      throw this.openError;
    }
    return this.session;
  }
}

export class MemoryInventory implements InventoryStore {
  saved: DeviceRecord[][] = [];

  constructor(private records: DeviceRecord[], private readonly loadError?: Error) {}

  load(): DeviceRecord[] {
    if (this.loadError) {
      throw this.loadError;
    }
    return [...this.records];
  }

  save(records: readonly DeviceRecord[]): void {
    this.records = [...records];
    this.saved.push([...records]);
  }
}

export class ScriptedBackend implements GenerationBackend {
  prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async generate(prompt: string): Promise<string> {
    const reply = this.replies[this.prompts.length];
    this.prompts.push(prompt);
    if (reply === undefined) {
      throw new Error('No scripted reply');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
