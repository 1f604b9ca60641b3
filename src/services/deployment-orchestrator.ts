/**
 * Deployment Orchestrator
 * 장비 하나에 대해 연결 -> 적용 -> 종료를 진행하고 구조화된 결과를 반환
 *
 * Idle -> Connecting -> { Connected -> Applying -> { Applied, ApplyFailed } } | ConnectFailed -> Closed
 */

import {
  CommandList,
  DeploymentResult,
  DeploymentState,
  DeviceRecord,
  toCredentials,
} from '../types';
import { DeviceGateway, DeviceSession, closeQuietly, withSession } from './session-gateway';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export const INTERFACE_BRIEF_COMMAND = 'show ip interface brief';

export interface OrchestratorOptions {
  sshPort?: number;
  onStateChange?: (deviceName: string, state: DeploymentState) => void;
}

function freezeResult(result: DeploymentResult): DeploymentResult {
  return Object.freeze({ ...result });
}

export class DeploymentOrchestrator {
  private sshPort: number;
  private onStateChange?: (deviceName: string, state: DeploymentState) => void;

  constructor(private readonly gateway: DeviceGateway, options: OrchestratorOptions = {}) {
    this.sshPort = options.sshPort ?? 22;
    this.onStateChange = options.onStateChange;
  }

  /**
   * 명령 목록을 장비에 적용
   * 연결/실행 오류는 예외 대신 실패 결과로 반환
   */
  async deploy(device: DeviceRecord, commands: CommandList): Promise<DeploymentResult> {
    const transition = (state: DeploymentState): void => {
      logger.debug(`[Deploy] ${device.name}: ${state}`);
      this.onStateChange?.(device.name, state);
    };

    transition('Idle');
    transition('Connecting');

    let session: DeviceSession;
    try {
      session = await this.gateway.open(toCredentials(device, this.sshPort));
    } catch (error) {
      transition('ConnectFailed');
      logger.error(`[Deploy] Connection failed for ${device.name}: ${errorMessage(error)}`);
      transition('Closed');
      return freezeResult({
        deviceName: device.name,
        succeeded: false,
        output: '',
        error: errorMessage(error),
      });
    }

    transition('Connected');

    try {
      transition('Applying');

      if (commands.length === 0) {
        logger.info(`[Deploy] No commands for ${device.name}, nothing to apply`);
        transition('Applied');
        return freezeResult({ deviceName: device.name, succeeded: true, output: '' });
      }

      const output = await this.gateway.apply(session, commands);
      transition('Applied');
      logger.info(`[Deploy] Configuration applied on ${device.name} (${commands.length} commands)`);

      return freezeResult({ deviceName: device.name, succeeded: true, output });
    } catch (error) {
      // 장비가 일부 명령을 이미 반영했을 수 있음 (원자성 없음)
      transition('ApplyFailed');
      logger.error(`[Deploy] Apply failed for ${device.name}: ${errorMessage(error)}`);

      return freezeResult({
        deviceName: device.name,
        succeeded: false,
        output: '',
        error: errorMessage(error),
      });
    } finally {
      await closeQuietly(this.gateway, session);
      transition('Closed');
    }
  }

  /**
   * 인터페이스 요약 조회
   * @throws ConnectionError, ExecutionError
   */
  async queryInterfaces(device: DeviceRecord): Promise<string> {
    return withSession(this.gateway, toCredentials(device, this.sshPort), session =>
      this.gateway.read(session, INTERFACE_BRIEF_COMMAND)
    );
  }
}
