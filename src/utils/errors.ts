/**
 * 오류 분류
 * 한 장비의 처리 중 발생한 오류는 해당 장비에만 국한되며,
 * 인벤토리 로드 실패만 실행 전체를 중단시킨다.
 */

/**
 * 인벤토리에 없는 장비 이름
 */
export class LookupError extends Error {
  readonly deviceName: string;

  constructor(deviceName: string) {
    super(`Device not found in inventory: ${deviceName}`);
    this.name = 'LookupError';
    this.deviceName = deviceName;
  }
}

/**
 * 세션 연결 실패 (인증, 도달 불가, 타임아웃, privileged 모드 진입 실패)
 */
export class ConnectionError extends Error {
  readonly host: string;
  readonly causeText: string;

  constructor(host: string, cause: unknown) {
    const causeText = errorMessage(cause);
    super(`Error connecting to device ${host}: ${causeText}`);
    this.name = 'ConnectionError';
    this.host = host;
    this.causeText = causeText;
  }
}

/**
 * 세션이 열린 뒤 명령 적용 실패
 */
export class ExecutionError extends Error {
  readonly host?: string;
  readonly causeText: string;

  constructor(cause: unknown, host?: string) {
    const causeText = errorMessage(cause);
    super(host
      ? `Error sending configuration to ${host}: ${causeText}`
      : `Error sending configuration: ${causeText}`);
    this.name = 'ExecutionError';
    this.host = host;
    this.causeText = causeText;
  }
}

/**
 * 텍스트 생성 백엔드 오류 (도달 불가, 타임아웃, 오류 형태의 응답)
 */
export class GenerationError extends Error {
  constructor(cause: unknown) {
    super(`Error communicating with generation backend: ${errorMessage(cause)}`);
    this.name = 'GenerationError';
  }
}

export class InventoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InventoryError';
  }
}

export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP 응답 상태 코드 매핑
 */
export function statusForError(error: unknown): number {
  if (error instanceof LookupError) return 404;
  if (error instanceof RenderError) return 400;
  if (error instanceof ConnectionError || error instanceof ExecutionError) return 502;
  if (error instanceof GenerationError) return 502;
  return 500;
}
