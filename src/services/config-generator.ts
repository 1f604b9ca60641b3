import { DeviceRecord } from '../types';
import { GenerationBackend } from './generation-client';
import logger from '../utils/logger';

/**
 * 장비 정보를 포함한 생성 프롬프트 작성
 */
export function buildDevicePrompt(device: DeviceRecord, requirements: string): string {
  return [
    'Generate a Cisco IOS XE configuration for the following device and requirements:',
    '',
    'Device Information:',
    `- Name: ${device.name || 'Unknown'}`,
    '- Type: Router',
    `- Management IP: ${device.managementAddress || 'Unknown'}`,
    `- Location: ${device.description || 'Unknown'}`,
    '',
    'Requirements:',
    requirements.trim(),
    '',
    'Please provide only the Cisco IOS XE configuration commands, without explanations or comments.',
    'Start with the interface configuration and include all necessary commands.',
  ].join('\n');
}

export class ConfigGenerator {
  constructor(private readonly backend: GenerationBackend) {}

  /**
   * @throws GenerationError
   */
  async generate(device: DeviceRecord, requirements: string): Promise<string> {
    logger.info(`[Generator] Generating configuration for ${device.name}`);
    const text = await this.backend.generate(buildDevicePrompt(device, requirements));
    logger.info(`[Generator] Configuration generated for ${device.name}`);
    return text;
  }
}
