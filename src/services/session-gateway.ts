/**
 * Session Gateway
 * 장비 세션 열기/사용/닫기 및 전송 계층 오류를 타입이 있는 오류로 변환
 */

import { v4 as uuidv4 } from 'uuid';
import { CommandList, Credentials } from '../types';
import { ConnectionError, ExecutionError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

/**
 * 전송 계층이 열어준 원격 CLI 세션
 */
export interface TransportSession {
  sendConfigSet(commands: CommandList): Promise<string>;
  sendCommand(command: string): Promise<string>;
  close(): Promise<void>;
}

/**
 * 원격 CLI 전송 계층 (privileged 모드 진입까지 포함)
 */
export interface SessionTransport {
  open(credentials: Credentials): Promise<TransportSession>;
}

export interface DeviceSession {
  readonly id: string;
  readonly host: string;
  readonly openedAt: Date;
}

export interface DeviceGateway {
  open(credentials: Credentials): Promise<DeviceSession>;
  apply(session: DeviceSession, commands: CommandList): Promise<string>;
  read(session: DeviceSession, query: string): Promise<string>;
  close(session: DeviceSession): Promise<void>;
}

interface OpenSession {
  session: DeviceSession;
  transport: TransportSession;
}

/**
 * close 실패는 경고만 남김 (결과를 덮어쓰지 않음)
 */
export async function closeQuietly(gateway: DeviceGateway, session: DeviceSession): Promise<void> {
  try {
    await gateway.close(session);
  } catch (error) {
    logger.warn(`[Gateway] Error closing session ${session.id}: ${errorMessage(error)}`);
  }
}

/**
 * 세션 범위 실행: 어떤 경로로 빠져나가도 close 보장
 */
export async function withSession<T>(
  gateway: DeviceGateway,
  credentials: Credentials,
  fn: (session: DeviceSession) => Promise<T>
): Promise<T> {
  const session = await gateway.open(credentials);
  try {
    return await fn(session);
  } finally {
    await closeQuietly(gateway, session);
  }
}

export class SessionGateway implements DeviceGateway {
  private sessions: Map<string, OpenSession> = new Map();

  constructor(private readonly transport: SessionTransport) {}

  /**
   * 세션 열기
   * @throws ConnectionError
   */
  async open(credentials: Credentials): Promise<DeviceSession> {
    logger.info(`[Gateway] Connecting to ${credentials.username}@${credentials.host}:${credentials.port}`);

    let transportSession: TransportSession;
    try {
      transportSession = await this.transport.open(credentials);
    } catch (error) {
      logger.error(`[Gateway] Connection to ${credentials.host} failed: ${errorMessage(error)}`);
      throw new ConnectionError(credentials.host, error);
    }

    const session: DeviceSession = {
      id: uuidv4(),
      host: credentials.host,
      openedAt: new Date(),
    };
    this.sessions.set(session.id, { session, transport: transportSession });
    logger.info(`[Gateway] Session opened: ${session.id} -> ${session.host}`);

    return session;
  }

  /**
   * 명령 목록을 하나의 설정 트랜잭션으로 전송 (재시도 없음)
   * @throws ExecutionError
   */
  async apply(session: DeviceSession, commands: CommandList): Promise<string> {
    const open = this.requireOpen(session);

    try {
      logger.info(`[Gateway] Applying ${commands.length} commands on ${session.host}`);
      const output = await open.transport.sendConfigSet(commands);
      logger.debug(`[Gateway] Apply output from ${session.host}:\n${output}`);
      return output;
    } catch (error) {
      logger.error(`[Gateway] Apply failed on ${session.host}: ${errorMessage(error)}`);
      throw new ExecutionError(error, session.host);
    }
  }

  /**
   * 단일 조회 명령 실행
   * @throws ExecutionError
   */
  async read(session: DeviceSession, query: string): Promise<string> {
    const open = this.requireOpen(session);

    try {
      logger.info(`[Gateway] Running "${query}" on ${session.host}`);
      return await open.transport.sendCommand(query);
    } catch (error) {
      logger.error(`[Gateway] Query failed on ${session.host}: ${errorMessage(error)}`);
      throw new ExecutionError(error, session.host);
    }
  }

  /**
   * 세션 닫기 (여러 번 호출해도 안전, 예외를 던지지 않음)
   */
  async close(session: DeviceSession): Promise<void> {
    const open = this.sessions.get(session.id);
    if (!open) {
      return;
    }
    this.sessions.delete(session.id);

    try {
      await open.transport.close();
      logger.info(`[Gateway] Session closed: ${session.id}`);
    } catch (error) {
      logger.warn(`[Gateway] Error closing session ${session.id}: ${errorMessage(error)}`);
    }
  }

  withSession<T>(credentials: Credentials, fn: (session: DeviceSession) => Promise<T>): Promise<T> {
    return withSession(this, credentials, fn);
  }

  isOpen(session: DeviceSession): boolean {
    return this.sessions.has(session.id);
  }

  get openSessionCount(): number {
    return this.sessions.size;
  }

  private requireOpen(session: DeviceSession): OpenSession {
    const open = this.sessions.get(session.id);
    if (!open) {
      throw new ExecutionError(`Session not open: ${session.id}`, session.host);
    }
    return open;
  }
}
