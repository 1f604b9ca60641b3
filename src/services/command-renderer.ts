/**
 * 인터페이스 설정 템플릿 렌더링
 * 알려진 의도(create/delete)에 대한 결정적 템플릿 확장
 */

import { CommandList, InterfaceIntent } from '../types';
import { RenderError } from '../utils/errors';

type TemplateVars = Record<string, string>;

const CREATE_TEMPLATE = `
interface {{ interface }}
 ip address {{ ip_address }} {{ subnet }}
 no shutdown
`;

const DELETE_TEMPLATE = `
interface {{ interface }}
 no ip address
 shutdown
`;

function expand(template: string, vars: TemplateVars): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_match, key: string) => vars[key] ?? '');
}

/**
 * 확장된 텍스트를 명령 목록으로 변환 (공백 제거, 빈 줄 제외)
 */
export function toCommandList(text: string): CommandList {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

function requireValue(value: string | undefined, label: string): string {
  const trimmed = value?.trim() ?? '';
  if (trimmed.length === 0) {
    throw new RenderError(`${label} is required`);
  }
  // 줄바꿈이 섞이면 템플릿 밖의 명령이 추가됨
  if (/[\r\n]/.test(trimmed)) {
    throw new RenderError(`${label} must be a single line`);
  }
  return trimmed;
}

export function renderInterfaceConfig(
  intent: InterfaceIntent,
  interfaceName: string,
  ipAddress?: string,
  subnetMask?: string
): CommandList {
  const iface = requireValue(interfaceName, 'Interface name');

  if (intent === 'create') {
    return toCommandList(expand(CREATE_TEMPLATE, {
      interface: iface,
      ip_address: requireValue(ipAddress, 'IP address'),
      subnet: requireValue(subnetMask, 'Subnet mask'),
    }));
  }

  return toCommandList(expand(DELETE_TEMPLATE, { interface: iface }));
}
