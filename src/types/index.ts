import type { DeviceRecord } from './inventory';

// 장비에 순서대로 적용되는 CLI 명령 목록 (빈 줄 없음, 공백 제거됨)
export type CommandList = readonly string[];

export type InterfaceIntent = 'create' | 'delete';

// 장비별 배포 결과 (생성 후 변경하지 않음)
export interface DeploymentResult {
  readonly deviceName: string;
  readonly succeeded: boolean;
  readonly output: string;
  readonly error?: string;
}

export type DeploymentState =
  | 'Idle'
  | 'Connecting'
  | 'Connected'
  | 'ConnectFailed'
  | 'Applying'
  | 'Applied'
  | 'ApplyFailed'
  | 'Closed';

// 템플릿 기반 의도
export interface TemplateIntentSource {
  kind: 'template';
  intent: InterfaceIntent;
  interfaceName: string;
  ipAddress?: string;
  subnetMask?: string;
}

// 자연어 요구사항 기반 의도
export interface GeneratedIntentSource {
  kind: 'generated';
  requirements: string;
}

export type IntentSource = TemplateIntentSource | GeneratedIntentSource;

export type DeviceOutcomeStatus = 'deployed' | 'failed' | 'declined' | 'skipped' | 'empty';

export interface DeviceOutcome {
  deviceName: string;
  status: DeviceOutcomeStatus;
  commands: CommandList;
  warnings: string[];
  result?: DeploymentResult;
  error?: string;
}

export interface PipelineReport {
  runId: string;
  outcomes: DeviceOutcome[];
  results: DeploymentResult[];
}

export interface PipelineHooks {
  // 생성된 명령 적용 전 명시적 확인 (없으면 적용하지 않음)
  confirm?: (device: DeviceRecord, commands: CommandList) => Promise<boolean>;
  onCommands?: (device: DeviceRecord, commands: CommandList, rawText?: string) => void;
}

// HTTP API 응답 인터페이스
export interface ApiResponse<T = unknown> {
  success: boolean;
  result?: T;
  error?: string;
  timestamp: string;
}

export * from './inventory';
