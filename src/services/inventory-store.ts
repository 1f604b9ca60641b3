/**
 * 장비 인벤토리 저장소
 * CSV 파일 기반 (Name, Management IP, Username, Password, Description)
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import {
  DeviceRecord,
  INVENTORY_COLUMNS,
  InventoryColumn,
  InventoryRow,
  deviceToRow,
  rowToDevice,
} from '../types/inventory';
import { InventoryError, LookupError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface InventoryStore {
  load(): DeviceRecord[];
  save(records: readonly DeviceRecord[]): void;
}

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

export class CsvInventoryStore implements InventoryStore {
  constructor(readonly filePath: string) {}

  /**
   * 인벤토리 로드
   * @throws InventoryError 파일 없음, 파싱 실패, 컬럼 누락, 이름 중복
   */
  load(): DeviceRecord[] {
    if (!fs.existsSync(this.filePath)) {
      throw new InventoryError(`Inventory file not found: ${this.filePath}`);
    }

    let parsed: unknown;
    try {
      const content = fs.readFileSync(this.filePath, 'utf-8');
      parsed = parse(content, { bom: true, skip_empty_lines: true });
    } catch (error) {
      logger.error(`[Inventory] Failed to read ${this.filePath}: ${errorMessage(error)}`);
      throw new InventoryError(`Error reading inventory: ${errorMessage(error)}`);
    }

    if (!isStringMatrix(parsed) || parsed.length === 0) {
      throw new InventoryError(`Inventory file is empty: ${this.filePath}`);
    }

    const [header, ...rows] = parsed;
    const indexes = new Map<InventoryColumn, number>();
    for (const column of INVENTORY_COLUMNS) {
      const index = header.findIndex(cell => cell.trim() === column);
      if (index < 0) {
        throw new InventoryError(`Inventory is missing column: ${column}`);
      }
      indexes.set(column, index);
    }

    const records = rows.map((cells, rowIndex) => {
      const cell = (column: InventoryColumn): string => cells[indexes.get(column) ?? -1] ?? '';
      const row: InventoryRow = {
        'Name': cell('Name'),
        'Management IP': cell('Management IP'),
        'Username': cell('Username'),
        'Password': cell('Password'),
        'Description': cell('Description'),
      };

      if (row['Name'].trim().length === 0) {
        throw new InventoryError(`Inventory row ${rowIndex + 2}: Name is required`);
      }
      return rowToDevice(row);
    });

    assertUniqueNames(records);
    logger.info(`[Inventory] Loaded ${records.length} devices from ${this.filePath}`);

    return records;
  }

  save(records: readonly DeviceRecord[]): void {
    assertUniqueNames(records);

    const content = stringify(records.map(deviceToRow), {
      header: true,
      columns: [...INVENTORY_COLUMNS],
    });

    try {
      fs.writeFileSync(this.filePath, content, 'utf-8');
    } catch (error) {
      throw new InventoryError(`Error writing inventory: ${errorMessage(error)}`);
    }
    logger.info(`[Inventory] Saved ${records.length} devices to ${this.filePath}`);
  }
}

function assertUniqueNames(records: readonly DeviceRecord[]): void {
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.name)) {
      throw new InventoryError(`Duplicate device name in inventory: ${record.name}`);
    }
    seen.add(record.name);
  }
}

/**
 * @throws LookupError
 */
export function findDevice(records: readonly DeviceRecord[], name: string): DeviceRecord {
  const device = records.find(record => record.name === name);
  if (!device) {
    throw new LookupError(name);
  }
  return device;
}

export function addDevice(records: readonly DeviceRecord[], device: DeviceRecord): DeviceRecord[] {
  if (device.name.trim().length === 0) {
    throw new InventoryError('Device name is required');
  }
  if (records.some(record => record.name === device.name)) {
    throw new InventoryError(`Device already exists: ${device.name}`);
  }
  return [...records, device];
}

/**
 * @throws LookupError
 */
export function removeDevice(records: readonly DeviceRecord[], name: string): DeviceRecord[] {
  findDevice(records, name);
  return records.filter(record => record.name !== name);
}
