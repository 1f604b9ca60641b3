/**
 * Generated-text sanitizer
 * 생성된 텍스트(신뢰할 수 없음)를 장비에 보낼 명령 목록으로 변환
 *
 * 알려진 잡음(주석, 시뮬레이션된 프롬프트 접두사)만 제거하며
 * 명령의 의미는 검증하지 않는다. 인식하지 못한 내용은 그대로 통과한다.
 */

import { CommandList } from '../types';

// 줄 앞에서 제거할 프롬프트 접두사 (순서대로 검사)
export const DEFAULT_PROMPT_PREFIXES: readonly string[] = [
  'Router(config)#',
  '(config)#',
  'R1(config)#',
];

const COMMENT_MARKERS = ['#', '!'];

// 산문/마크다운으로 보이는 줄 (제거하지 않고 경고만)
const SUSPICIOUS_PATTERNS: readonly RegExp[] = [
  /^```/,
  /^[*-]\s/,
  /^\d+\.\s/,
  /[:.]$/,
];

export interface SanitizeOptions {
  prefixes?: readonly string[];
}

export interface SanitizeReport {
  commands: CommandList;
  suspicious: string[];
}

function isDiscarded(line: string): boolean {
  return line.length === 0 || COMMENT_MARKERS.some(marker => line.startsWith(marker));
}

function cleanLine(rawLine: string, prefixes: readonly string[]): string | null {
  let line = rawLine.trim();

  for (;;) {
    if (isDiscarded(line)) {
      return null;
    }

    const prefix = prefixes.find(p => line.startsWith(p));
    if (!prefix) {
      return line;
    }
    line = line.slice(prefix.length).trim();
  }
}

export function sanitize(rawText: string | null | undefined, options: SanitizeOptions = {}): CommandList {
  if (!rawText) {
    return [];
  }

  const prefixes = options.prefixes ?? DEFAULT_PROMPT_PREFIXES;
  const commands: string[] = [];

  for (const rawLine of rawText.split('\n')) {
    const line = cleanLine(rawLine, prefixes);
    if (line !== null) {
      commands.push(line);
    }
  }

  return commands;
}

/**
 * sanitize 결과와 함께 의심스러운 줄 목록 반환
 */
export function inspectGeneratedText(
  rawText: string | null | undefined,
  options: SanitizeOptions = {}
): SanitizeReport {
  const commands = sanitize(rawText, options);
  const suspicious = commands.filter(line =>
    SUSPICIOUS_PATTERNS.some(pattern => pattern.test(line))
  );

  return { commands, suspicious };
}
