import { Command, Option } from 'commander';
import { stringify as toYaml } from 'yaml';
import {
  CommandList,
  DeviceOutcome,
  DeviceRecord,
  InterfaceIntent,
  TemplateIntentSource,
  toSafeDevice,
} from '../types';
import { ServiceContainer } from '../services/container';
import { addDevice, findDevice, removeDevice } from '../services/inventory-store';
import { renderInterfaceConfig } from '../services/command-renderer';
import { InventoryError, LookupError, errorMessage } from '../utils/errors';
import { Prompter } from './prompt';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export interface CliDependencies {
  servicesFor(inventoryFile?: string): ServiceContainer;
  prompter: Prompter;
  io: CliIO;
}

interface InventoryOption {
  inventory?: string;
}

interface ListOptions extends InventoryOption {
  format: 'table' | 'json' | 'yaml';
}

interface ConfigureOptions extends InventoryOption {
  device?: string;
  action?: string;
  interface?: string;
  ip?: string;
  mask?: string;
  dryRun?: boolean;
}

interface GenerateOptions extends InventoryOption {
  requirements?: string;
  yes?: boolean;
}

interface DeviceOption extends InventoryOption {
  device: string;
}

interface AddDeviceOptions extends InventoryOption {
  name: string;
  ip: string;
  user: string;
  password: string;
  desc: string;
}

interface RemoveDeviceOptions extends InventoryOption {
  name: string;
}

const DEFAULT_INTERFACE = 'GigabitEthernet2';
const DEFAULT_SUBNET_MASK = '255.255.255.0';
const RULE = '='.repeat(50);

function formatTable(devices: DeviceRecord[]): string[] {
  const headers = ['Name', 'Management IP', 'Username', 'Description'];
  const rows = devices.map(d => [d.name, d.managementAddress, d.username, d.description]);
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map(row => row[i].length))
  );
  const line = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  return [line(headers), line(widths.map(w => '-'.repeat(w))), ...rows.map(line)];
}

function describeOutcome(outcome: DeviceOutcome): string {
  switch (outcome.status) {
    case 'deployed':
      return `${outcome.deviceName}: deployed (${outcome.commands.length} commands)`;
    case 'declined':
      return `${outcome.deviceName}: configuration generated but not applied`;
    case 'empty':
      return `${outcome.deviceName}: no valid configuration commands generated`;
    case 'skipped':
      return `${outcome.deviceName}: skipped (${outcome.error ?? 'generation failed'})`;
    case 'failed':
      return `${outcome.deviceName}: failed (${outcome.error ?? 'unknown error'})`;
  }
}

export function createProgram(deps: CliDependencies): Command {
  const { io, prompter } = deps;
  const program = new Command();

  program
    .name('ios-config-pilot')
    .description('Render, generate and deploy Cisco IOS interface configuration')
    .version('1.0.0');

  /**
   * 인벤토리 로드 실패 시 null (종료 코드 1)
   */
  const loadInventory = (services: ServiceContainer): DeviceRecord[] | null => {
    try {
      return services.inventory.load();
    } catch (error) {
      io.err(`Error loading inventory: ${errorMessage(error)}`);
      io.setExitCode(1);
      return null;
    }
  };

  const lookup = (records: DeviceRecord[], name: string): DeviceRecord | null => {
    try {
      return findDevice(records, name);
    } catch (error) {
      if (error instanceof LookupError) {
        io.err(`Device ${name} not found in inventory.`);
        io.setExitCode(1);
        return null;
      }
      throw error;
    }
  };

  const printCommands = (commands: CommandList): void => {
    for (const command of commands) {
      io.out(command);
    }
  };

  program
    .command('list')
    .description('List all devices in the inventory')
    .option('--inventory <file>', 'Inventory CSV file')
    .addOption(new Option('--format <format>', 'Output format').choices(['table', 'json', 'yaml']).default('table'))
    .action((options: ListOptions) => {
      const records = loadInventory(deps.servicesFor(options.inventory));
      if (!records) return;

      if (options.format === 'json') {
        io.out(JSON.stringify(records.map(toSafeDevice), null, 4));
        return;
      }
      if (options.format === 'yaml') {
        io.out(toYaml(records.map(toSafeDevice), { indent: 4 }).trimEnd());
        return;
      }
      formatTable(records).forEach(line => io.out(line));
    });

  program
    .command('configure')
    .description('Render and deploy an interface configuration to one device')
    .option('--inventory <file>', 'Inventory CSV file')
    .option('--device <name>', 'Device name in inventory')
    .option('--action <action>', 'create or delete')
    .option('--interface <name>', 'Interface to configure')
    .option('--ip <address>', 'IP address (create)')
    .option('--mask <mask>', 'Subnet mask (create)')
    .option('--dry-run', 'Render only, do not deploy')
    .action(async (options: ConfigureOptions) => {
      const services = deps.servicesFor(options.inventory);
      const records = loadInventory(services);
      if (!records) return;

      const deviceName = options.device || await prompter.ask('Device name');
      const device = lookup(records, deviceName);
      if (!device) return;

      const action = (options.action || await prompter.ask('Action (create/delete)')).toLowerCase();
      if (action !== 'create' && action !== 'delete') {
        io.err(`Invalid action: ${action}. Choose create or delete.`);
        io.setExitCode(1);
        return;
      }
      const intent: InterfaceIntent = action;

      const interfaceName = options.interface || await prompter.ask('Interface name', DEFAULT_INTERFACE);
      let ipAddress: string | undefined;
      let subnetMask: string | undefined;
      if (intent === 'create') {
        ipAddress = options.ip || await prompter.ask('IP address');
        subnetMask = options.mask || await prompter.ask('Subnet mask', DEFAULT_SUBNET_MASK);
      }

      const source: TemplateIntentSource = { kind: 'template', intent, interfaceName, ipAddress, subnetMask };

      if (options.dryRun) {
        try {
          printCommands(renderInterfaceConfig(intent, interfaceName, ipAddress, subnetMask));
        } catch (error) {
          io.err(errorMessage(error));
          io.setExitCode(1);
        }
        return;
      }

      const report = await services.driver.run([device], source, {
        onCommands: (_device, commands) => {
          io.out(`\nSending configuration to ${device.name}:`);
          printCommands(commands);
        },
      });

      const [outcome] = report.outcomes;
      if (outcome.result?.succeeded) {
        io.out(`Output from ${device.name}:\n${outcome.result.output}`);
      } else {
        io.err(`Error on ${device.name}: ${outcome.error ?? 'unknown error'}`);
        io.setExitCode(1);
      }
    });

  program
    .command('generate')
    .description('Generate configuration from a natural-language requirement and deploy it')
    .option('--inventory <file>', 'Inventory CSV file')
    .option('--requirements <text>', 'Configuration requirements')
    .option('-y, --yes', 'Apply generated configuration without asking')
    .action(async (options: GenerateOptions) => {
      const services = deps.servicesFor(options.inventory);
      const records = loadInventory(services);
      if (!records) return;
      io.out(`Loaded ${records.length} devices from inventory`);

      const requirements = options.requirements ||
        await prompter.ask('Requirements (e.g. Configure interface GigabitEthernet0/1 with IP 192.168.1.1/24 and enable it)');
      if (!requirements.trim()) {
        io.out('No requirements provided. Exiting.');
        return;
      }

      const report = await services.driver.run(records, { kind: 'generated', requirements }, {
        onCommands: (device, commands, rawText) => {
          io.out(`\n${RULE}\nProcessing device: ${device.name}\n${RULE}`);
          if (rawText !== undefined) {
            io.out(`Generated configuration for ${device.name}:`);
            io.out('-'.repeat(40));
            io.out(rawText);
            io.out('-'.repeat(40));
          }
          io.out(`Processed ${commands.length} configuration commands`);
        },
        confirm: device => options.yes
          ? Promise.resolve(true)
          : prompter.confirm(`Apply configuration to ${device.name}?`),
      });

      io.out(`\nSummary (run ${report.runId}):`);
      for (const outcome of report.outcomes) {
        io.out(`  ${describeOutcome(outcome)}`);
        outcome.warnings.forEach(warning => io.out(`    warning: ${warning}`));
      }
    });

  program
    .command('interfaces')
    .description('Show the interface summary of a device')
    .option('--inventory <file>', 'Inventory CSV file')
    .requiredOption('--device <name>', 'Device name in inventory')
    .action(async (options: DeviceOption) => {
      const services = deps.servicesFor(options.inventory);
      const records = loadInventory(services);
      if (!records) return;

      const device = lookup(records, options.device);
      if (!device) return;

      try {
        io.out(await services.orchestrator.queryInterfaces(device));
      } catch (error) {
        io.err(errorMessage(error));
        io.setExitCode(1);
      }
    });

  const deviceCommand = program
    .command('device')
    .description('Manage inventory records');

  deviceCommand
    .command('add')
    .description('Add a device and save the inventory')
    .option('--inventory <file>', 'Inventory CSV file')
    .requiredOption('--name <name>', 'Device name')
    .requiredOption('--ip <address>', 'Management IP')
    .requiredOption('--user <username>', 'Username')
    .requiredOption('--password <password>', 'Password')
    .requiredOption('--desc <description>', 'Description')
    .action((options: AddDeviceOptions) => {
      const services = deps.servicesFor(options.inventory);
      const records = loadInventory(services);
      if (!records) return;

      try {
        services.inventory.save(addDevice(records, {
          name: options.name,
          managementAddress: options.ip,
          username: options.user,
          secret: options.password,
          description: options.desc,
        }));
        io.out(`Device '${options.name}' added and saved!`);
      } catch (error) {
        if (!(error instanceof InventoryError)) throw error;
        io.err(error.message);
        io.setExitCode(1);
      }
    });

  deviceCommand
    .command('remove')
    .description('Remove a device and save the inventory')
    .option('--inventory <file>', 'Inventory CSV file')
    .requiredOption('--name <name>', 'Device name')
    .action((options: RemoveDeviceOptions) => {
      const services = deps.servicesFor(options.inventory);
      const records = loadInventory(services);
      if (!records) return;

      if (!lookup(records, options.name)) return;
      services.inventory.save(removeDevice(records, options.name));
      io.out(`Device '${options.name}' removed and saved!`);
    });

  return program;
}
