/**
 * Pipeline Driver
 * 인벤토리 순서대로 장비를 하나씩 처리하고 장비별 결과를 모은다.
 * 한 장비의 실패가 실행 전체를 중단시키지 않는다.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CommandList,
  DeploymentResult,
  DeviceOutcome,
  DeviceRecord,
  GeneratedIntentSource,
  IntentSource,
  PipelineHooks,
  PipelineReport,
  TemplateIntentSource,
} from '../types';
import { renderInterfaceConfig } from './command-renderer';
import { inspectGeneratedText } from './config-sanitizer';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface Deployer {
  deploy(device: DeviceRecord, commands: CommandList): Promise<DeploymentResult>;
}

export interface DeviceConfigGenerator {
  generate(device: DeviceRecord, requirements: string): Promise<string>;
}

export interface PipelineDriverOptions {
  // 생성 실패도 succeeded:false 결과로 기록
  recordGenerationFailures?: boolean;
  prefixes?: readonly string[];
}

export class PipelineDriver {
  private recordGenerationFailures: boolean;
  private prefixes?: readonly string[];

  constructor(
    private readonly deployer: Deployer,
    private readonly generator?: DeviceConfigGenerator,
    options: PipelineDriverOptions = {}
  ) {
    this.recordGenerationFailures = options.recordGenerationFailures ?? false;
    this.prefixes = options.prefixes;
  }

  async run(
    records: readonly DeviceRecord[],
    intentSource: IntentSource,
    hooks: PipelineHooks = {}
  ): Promise<PipelineReport> {
    const runId = uuidv4();
    const outcomes: DeviceOutcome[] = [];
    const results: DeploymentResult[] = [];

    logger.info(`[Pipeline] Run ${runId}: ${records.length} devices (${intentSource.kind})`);

    for (const device of records) {
      logger.info(`[Pipeline] Processing device: ${device.name}`);

      const outcome = intentSource.kind === 'template'
        ? await this.runTemplate(device, intentSource, hooks)
        : await this.runGenerated(device, intentSource, hooks);

      outcomes.push(outcome);
      if (outcome.result) {
        results.push(outcome.result);
      }

      logger.info(`[Pipeline] Completed ${device.name}: ${outcome.status}`);
    }

    return { runId, outcomes, results };
  }

  private async runTemplate(
    device: DeviceRecord,
    source: TemplateIntentSource,
    hooks: PipelineHooks
  ): Promise<DeviceOutcome> {
    let commands: CommandList;
    try {
      commands = renderInterfaceConfig(source.intent, source.interfaceName, source.ipAddress, source.subnetMask);
    } catch (error) {
      logger.error(`[Pipeline] Render failed for ${device.name}: ${errorMessage(error)}`);
      return { deviceName: device.name, status: 'failed', commands: [], warnings: [], error: errorMessage(error) };
    }

    hooks.onCommands?.(device, commands);
    return this.deployOutcome(device, commands, []);
  }

  private async runGenerated(
    device: DeviceRecord,
    source: GeneratedIntentSource,
    hooks: PipelineHooks
  ): Promise<DeviceOutcome> {
    if (!this.generator) {
      throw new Error('Generated intents require a configuration generator');
    }

    let rawText: string;
    try {
      rawText = await this.generator.generate(device, source.requirements);
    } catch (error) {
      logger.warn(`[Pipeline] Generation failed for ${device.name}, skipping: ${errorMessage(error)}`);
      const outcome: DeviceOutcome = {
        deviceName: device.name,
        status: 'skipped',
        commands: [],
        warnings: [],
        error: errorMessage(error),
      };
      if (this.recordGenerationFailures) {
        outcome.result = Object.freeze({
          deviceName: device.name,
          succeeded: false,
          output: '',
          error: errorMessage(error),
        });
      }
      return outcome;
    }

    const { commands, suspicious } = inspectGeneratedText(rawText, { prefixes: this.prefixes });
    const warnings = suspicious.map(line => `Unrecognized content passed through: ${line}`);
    for (const warning of warnings) {
      logger.warn(`[Pipeline] ${device.name}: ${warning}`);
    }

    hooks.onCommands?.(device, commands, rawText);

    if (commands.length === 0) {
      logger.warn(`[Pipeline] No valid configuration commands generated for ${device.name}`);
      return { deviceName: device.name, status: 'empty', commands, warnings };
    }

    // 명시적 확인 없이는 적용하지 않음
    let confirmed = false;
    try {
      confirmed = hooks.confirm ? await hooks.confirm(device, commands) : false;
    } catch (error) {
      logger.warn(`[Pipeline] Confirmation failed for ${device.name}: ${errorMessage(error)}`);
      return { deviceName: device.name, status: 'declined', commands, warnings, error: errorMessage(error) };
    }
    if (!confirmed) {
      logger.info(`[Pipeline] Deployment declined for ${device.name}`);
      return { deviceName: device.name, status: 'declined', commands, warnings };
    }

    return this.deployOutcome(device, commands, warnings);
  }

  private async deployOutcome(
    device: DeviceRecord,
    commands: CommandList,
    warnings: string[]
  ): Promise<DeviceOutcome> {
    const result = await this.deployer.deploy(device, commands);

    return {
      deviceName: device.name,
      status: result.succeeded ? 'deployed' : 'failed',
      commands,
      warnings,
      result,
      error: result.error,
    };
  }
}
