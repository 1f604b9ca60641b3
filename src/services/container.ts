import { AppConfig } from '../config';
import { CsvInventoryStore, InventoryStore } from './inventory-store';
import { IosSshTransport } from './ios-transport';
import { SessionGateway, SessionTransport } from './session-gateway';
import { DeploymentOrchestrator } from './deployment-orchestrator';
import { GenerationBackend, OllamaClient } from './generation-client';
import { ConfigGenerator } from './config-generator';
import { PipelineDriver } from './pipeline-driver';

export interface ServiceContainer {
  inventory: InventoryStore;
  orchestrator: DeploymentOrchestrator;
  driver: PipelineDriver;
}

export interface ServiceOverrides {
  inventory?: InventoryStore;
  transport?: SessionTransport;
  backend?: GenerationBackend;
}

/**
 * 설정으로부터 서비스 구성 (테스트에서는 전송 계층/백엔드 교체)
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): ServiceContainer {
  const inventory = overrides.inventory ?? new CsvInventoryStore(config.inventoryFile);
  const transport = overrides.transport ?? new IosSshTransport({
    readyTimeoutMs: config.sshReadyTimeoutMs,
    commandTimeoutMs: config.sshCommandTimeoutMs,
  });
  const backend = overrides.backend ?? new OllamaClient({
    baseUrl: config.ollamaUrl,
    model: config.ollamaModel,
    timeoutMs: config.generationTimeoutMs,
  });

  const orchestrator = new DeploymentOrchestrator(new SessionGateway(transport), {
    sshPort: config.sshPort,
  });
  const driver = new PipelineDriver(orchestrator, new ConfigGenerator(backend));

  return { inventory, orchestrator, driver };
}
