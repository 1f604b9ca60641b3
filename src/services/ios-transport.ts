import { NodeSSH } from 'node-ssh';
import type { Duplex } from 'stream';
import { CommandList, Credentials } from '../types';
import { SessionTransport, TransportSession } from './session-gateway';
import logger from '../utils/logger';

// 어떤 모드든 프롬프트로 끝나는지 (Router> / Router#)
const ANY_PROMPT = /[>#]\s*$/;
// enable 응답: 비밀번호 요청 또는 프롬프트
const ENABLE_REPLY = /(?:[Pp]assword:|[>#])\s*$/;
const PASSWORD_PROMPT = /[Pp]assword:\s*$/;

export interface IosTransportOptions {
  readyTimeoutMs?: number;
  commandTimeoutMs?: number;
}

interface PromptWaiter {
  pattern: RegExp;
  resolve: (text: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function lastLine(text: string): string {
  const lines = text.replace(/\r/g, '').split('\n');
  return (lines[lines.length - 1] ?? '').trim();
}

/**
 * Cisco IOS 대화형 쉘 채널
 * 프롬프트를 기다리며 명령을 한 줄씩 전송
 */
export class IosShell implements TransportSession {
  private buffer = '';
  private waiter: PromptWaiter | null = null;
  private closed = false;
  private disposed = false;
  private promptPattern: RegExp = ANY_PROMPT;
  private hostname = '';

  constructor(
    private readonly channel: Duplex,
    private readonly commandTimeoutMs: number,
    private readonly dispose: () => void = () => undefined
  ) {
    channel.on('data', (chunk: Buffer | string) => {
      this.buffer += chunk.toString();
      this.checkWaiter();
    });
    channel.on('close', () => this.abort(new Error('Shell channel closed')));
    channel.on('error', (error: Error) => this.abort(error));
  }

  /**
   * 채널/연결 오류: 대기 중인 명령을 실패시키고 이후 명령을 거부
   */
  abort(error: Error): void {
    if (!this.closed) {
      logger.warn(`[IOS] Shell channel failed${this.hostname ? ` on ${this.hostname}` : ''}: ${error.message}`);
    }
    this.closed = true;
    this.failWaiter(error);
  }

  get deviceHostname(): string {
    return this.hostname;
  }

  /**
   * 초기 프롬프트 대기 후 privileged 모드 진입
   */
  async login(secret: string): Promise<void> {
    let prompt = lastLine(await this.readUntil(ANY_PROMPT));

    if (prompt.endsWith('>')) {
      this.write('enable');
      const reply = await this.readUntil(ENABLE_REPLY);

      if (PASSWORD_PROMPT.test(reply)) {
        this.write(secret);
        const afterSecret = await this.readUntil(ENABLE_REPLY);
        if (PASSWORD_PROMPT.test(afterSecret)) {
          throw new Error('Failed to enter privileged mode: secret rejected');
        }
        prompt = lastLine(afterSecret);
      } else {
        prompt = lastLine(reply);
      }
    }

    if (!prompt.endsWith('#')) {
      throw new Error('Failed to enter privileged mode');
    }

    this.hostname = prompt.slice(0, -1).trim();
    this.promptPattern = new RegExp(`${escapeRegExp(this.hostname)}(?:\\([^)]*\\))?[>#]\\s*$`);
    logger.debug(`[IOS] Privileged prompt detected for ${this.hostname}`);

    await this.run('terminal length 0');
  }

  async sendConfigSet(commands: CommandList): Promise<string> {
    const transcript: string[] = [];

    transcript.push(await this.run('configure terminal'));
    for (const command of commands) {
      transcript.push(await this.run(command));
    }
    transcript.push(await this.run('end'));

    return transcript.join('').replace(/\r/g, '');
  }

  async sendCommand(command: string): Promise<string> {
    const lines = (await this.run(command)).replace(/\r/g, '').split('\n');

    // 에코된 명령과 마지막 프롬프트 제거
    if (lines.length > 0 && lines[0].includes(command)) {
      lines.shift();
    }
    if (lines.length > 0 && this.promptPattern.test(lines[lines.length - 1])) {
      lines.pop();
    }

    return lines.join('\n').trimEnd();
  }

  async close(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.closed = true;
    this.failWaiter(new Error('Shell channel closed'));

    try {
      this.channel.end();
    } finally {
      this.dispose();
    }
  }

  private async run(command: string): Promise<string> {
    this.write(command);
    return this.readUntil(this.promptPattern);
  }

  private write(line: string): void {
    if (this.closed) {
      throw new Error('Shell channel closed');
    }
    this.channel.write(`${line}\n`);
  }

  private readUntil(pattern: RegExp): Promise<string> {
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new Error('Shell channel closed'));
        return;
      }

      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new Error(`Timed out after ${this.commandTimeoutMs}ms waiting for device prompt`));
      }, this.commandTimeoutMs);

      this.waiter = { pattern, resolve, reject, timer };
      this.checkWaiter();
    });
  }

  private checkWaiter(): void {
    const waiter = this.waiter;
    if (!waiter || !waiter.pattern.test(this.buffer)) {
      return;
    }

    const text = this.buffer;
    this.buffer = '';
    this.waiter = null;
    clearTimeout(waiter.timer);
    waiter.resolve(text);
  }

  private failWaiter(error: Error): void {
    const waiter = this.waiter;
    if (!waiter) {
      return;
    }
    this.waiter = null;
    clearTimeout(waiter.timer);
    waiter.reject(error);
  }
}

/**
 * node-ssh 기반 Cisco IOS 전송 계층
 */
export class IosSshTransport implements SessionTransport {
  private readyTimeoutMs: number;
  private commandTimeoutMs: number;

  constructor(options: IosTransportOptions = {}) {
    this.readyTimeoutMs = options.readyTimeoutMs ?? 10000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 15000;
  }

  async open(credentials: Credentials): Promise<TransportSession> {
    const ssh = new NodeSSH();

    try {
      await ssh.connect({
        host: credentials.host,
        port: credentials.port,
        username: credentials.username,
        password: credentials.password,
        readyTimeout: this.readyTimeoutMs,
        // IOS는 keyboard-interactive 인증을 요구하는 경우가 있음
        tryKeyboard: true,
      });

      const channel = await ssh.requestShell();
      const shell = new IosShell(channel, this.commandTimeoutMs, () => ssh.dispose());
      // 연결 후에는 node-ssh가 error 리스너를 제거하므로 직접 처리
      ssh.connection?.on('error', (error: Error) => shell.abort(error));
      await shell.login(credentials.privilegedSecret);

      logger.info(`[IOS] Privileged session ready on ${credentials.host} (${shell.deviceHostname})`);
      return shell;
    } catch (error) {
      ssh.dispose();
      throw error;
    }
  }
}
