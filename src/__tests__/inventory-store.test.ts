import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  CsvInventoryStore,
  addDevice,
  findDevice,
  removeDevice,
} from '../services/inventory-store';
import { InventoryError, LookupError } from '../utils/errors';
import { toSafeDevice } from '../types';
import { makeDevice } from './helpers/fakes';

const HEADER = 'Name,Management IP,Username,Password,Description';

describe('CsvInventoryStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'inventory-'));
    file = path.join(dir, 'inventory.csv');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads records by column name', () => {
    fs.writeFileSync(file, `${HEADER}\nR1,10.0.0.1,admin,x,core\n`);

    expect(new CsvInventoryStore(file).load()).toEqual([{
      name: 'R1',
      managementAddress: '10.0.0.1',
      username: 'admin',
      secret: 'x',
      description: 'core',
    }]);
  });

  it('accepts columns in any order', () => {
    fs.writeFileSync(file, 'Description,Password,Username,Management IP,Name\nedge,pw,ops,10.0.0.2,R2\n');

    expect(new CsvInventoryStore(file).load()).toEqual([makeDevice('R2', {
      managementAddress: '10.0.0.2',
      username: 'ops',
      secret: 'pw',
      description: 'edge',
    })]);
  });

  it('round-trips all five fields losslessly', () => {
    const store = new CsvInventoryStore(file);
    const records = [
      makeDevice('R1', { description: 'Core, building "A"' }),
      makeDevice('R2', { managementAddress: '10.0.0.2', secret: 'p,w"d', description: '' }),
    ];

    store.save(records);

    expect(fs.readFileSync(file, 'utf-8').split('\n')[0]).toBe(HEADER);
    expect(store.load()).toEqual(records);
  });

  it('fails when the file is missing', () => {
    expect(() => new CsvInventoryStore(path.join(dir, 'missing.csv')).load()).toThrow(InventoryError);
  });

  it('fails when a column is missing', () => {
    fs.writeFileSync(file, 'Name,Management IP,Username,Password\nR1,10.0.0.1,admin,x\n');

    expect(() => new CsvInventoryStore(file).load()).toThrow('Inventory is missing column: Description');
  });

  it('fails on duplicate or empty names', () => {
    fs.writeFileSync(file, `${HEADER}\nR1,10.0.0.1,admin,x,a\nR1,10.0.0.2,admin,x,b\n`);
    expect(() => new CsvInventoryStore(file).load()).toThrow('Duplicate device name in inventory: R1');

    fs.writeFileSync(file, `${HEADER}\n,10.0.0.1,admin,x,a\n`);
    expect(() => new CsvInventoryStore(file).load()).toThrow('Inventory row 2: Name is required');
  });

  it('fails on malformed rows', () => {
    fs.writeFileSync(file, `${HEADER}\nR1,10.0.0.1\n`);

    expect(() => new CsvInventoryStore(file).load()).toThrow(InventoryError);
  });
});

describe('inventory helpers', () => {
  const records = [makeDevice('R1'), makeDevice('R2')];

  it('finds a device by name', () => {
    expect(findDevice(records, 'R2').name).toBe('R2');
    expect(() => findDevice(records, 'R9')).toThrow(LookupError);
  });

  it('adds without mutating the input', () => {
    const next = addDevice(records, makeDevice('R3'));

    expect(next.map(d => d.name)).toEqual(['R1', 'R2', 'R3']);
    expect(records).toHaveLength(2);
    expect(() => addDevice(records, makeDevice('R1'))).toThrow('Device already exists: R1');
  });

  it('removes by name', () => {
    expect(removeDevice(records, 'R1').map(d => d.name)).toEqual(['R2']);
    expect(() => removeDevice(records, 'R9')).toThrow('Device not found in inventory: R9');
  });

  it('hides the secret in safe views', () => {
    expect(toSafeDevice(makeDevice('R1'))).toEqual({
      name: 'R1',
      managementAddress: '10.0.0.1',
      username: 'admin',
      description: 'core',
    });
  });
});
