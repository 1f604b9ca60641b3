/**
 * Ollama 텍스트 생성 클라이언트
 */

import { GenerationError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export const DEFAULT_SYSTEM_INSTRUCTION =
  'You are a network automation assistant. Generate only valid Cisco IOS XE CLI commands. ' +
  'Ensure the output is a full multi-line CLI configuration without explanations, comments, ' +
  'Markdown formatting, or any extra text. Only return raw Cisco IOS commands.';

export interface GenerationBackend {
  generate(prompt: string): Promise<string>;
}

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  system: string;
  stream: false;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OllamaClientOptions {
  baseUrl?: string;
  model?: string;
  systemInstruction?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class OllamaClient implements GenerationBackend {
  readonly baseUrl: string;
  readonly model: string;
  private systemInstruction: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl || 'http://localhost:11434').replace(/\/+$/, '');
    this.model = options.model || 'codellama:7b';
    this.systemInstruction = options.systemInstruction || DEFAULT_SYSTEM_INSTRUCTION;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * 프롬프트 전송 후 생성된 텍스트 반환
   * @throws GenerationError (네트워크 오류, 타임아웃, 오류 형태의 응답)
   */
  async generate(prompt: string): Promise<string> {
    const body: OllamaGenerateRequest = {
      model: this.model,
      prompt,
      system: this.systemInstruction,
      stream: false,
    };

    logger.info(`[Ollama] Generating with ${this.model} (timeout ${this.timeoutMs}ms)`);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error(`[Ollama] Request failed: ${errorMessage(error)}`);
      throw new GenerationError(error);
    }

    const bodyText = await response.text().catch((error: unknown) => {
      throw new GenerationError(error);
    });

    if (!response.ok) {
      logger.error(`[Ollama] HTTP ${response.status}: ${bodyText}`);
      throw new GenerationError(`HTTP ${response.status} ${bodyText || response.statusText}`.trim());
    }

    let payload: unknown;
    try {
      payload = JSON.parse(bodyText);
    } catch {
      throw new GenerationError('Response is not valid JSON');
    }

    if (!isRecord(payload)) {
      throw new GenerationError('Unexpected response shape');
    }
    if (typeof payload.error === 'string' && payload.error.length > 0) {
      throw new GenerationError(payload.error);
    }
    if (typeof payload.response !== 'string' || payload.response.trim().length === 0) {
      throw new GenerationError('No response generated');
    }

    logger.info(`[Ollama] Generated ${payload.response.length} characters`);
    return payload.response;
  }
}
