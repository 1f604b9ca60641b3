/**
 * 장비 인벤토리 타입 정의
 */

// CSV 컬럼 (순서 고정)
export const INVENTORY_COLUMNS = [
  'Name',
  'Management IP',
  'Username',
  'Password',
  'Description',
] as const;

export type InventoryColumn = typeof INVENTORY_COLUMNS[number];

export type InventoryRow = Record<InventoryColumn, string>;

export interface DeviceRecord {
  name: string;
  managementAddress: string;
  username: string;
  secret: string;
  description: string;
}

/**
 * 민감 정보 없는 장비 정보 (목록 출력 및 API 응답용)
 */
export interface SafeDeviceInfo {
  name: string;
  managementAddress: string;
  username: string;
  description: string;
}

/**
 * 세션 연결용 자격증명 (연결 시도마다 생성, 저장하지 않음)
 */
export interface Credentials {
  host: string;
  port: number;
  username: string;
  password: string;
  privilegedSecret: string;
}

export function toSafeDevice(device: DeviceRecord): SafeDeviceInfo {
  return {
    name: device.name,
    managementAddress: device.managementAddress,
    username: device.username,
    description: device.description,
  };
}

export function toCredentials(device: DeviceRecord, port: number = 22): Credentials {
  return {
    host: device.managementAddress,
    port,
    username: device.username,
    password: device.secret,
    privilegedSecret: device.secret,
  };
}

export function rowToDevice(row: InventoryRow): DeviceRecord {
  return {
    name: row['Name'],
    managementAddress: row['Management IP'],
    username: row['Username'],
    secret: row['Password'],
    description: row['Description'],
  };
}

export function deviceToRow(device: DeviceRecord): InventoryRow {
  return {
    'Name': device.name,
    'Management IP': device.managementAddress,
    'Username': device.username,
    'Password': device.secret,
    'Description': device.description,
  };
}
