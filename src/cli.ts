#!/usr/bin/env node
/**
 * arsc-tools - CLI Interface
 *
 * Command-line interface for inspecting compiled resource tables
 * (the raw resources.arsc member of an application package).
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { formatConfig, formatResource, formatResourceId } from './format.js';
import { ResourceTable } from './resource-table.js';
import { parseResourceIdText } from './resource-id.js';
import { Resource } from './types/resource.js';
import { createConsoleLogger } from './utils/logger.js';

type GlobalOptions = {
  lenient?: boolean;
  verbose?: boolean;
};

const program = new Command();

// Version is set at build time
const version = '0.1.0';

program
  .name('arsc-tools')
  .description('Inspect compiled resource tables (resources.arsc)')
  .version(version)
  .option('--lenient', 'Log reserved-field violations instead of failing')
  .option('--verbose', 'Print decoder debug output');

async function loadTable(file: string): Promise<ResourceTable> {
  const { lenient, verbose } = program.opts<GlobalOptions>();
  return ResourceTable.read({
    filePath: resolve(file),
    options: { strict: !lenient, logger: createConsoleLogger({ verbose }) },
  });
}

function fail(action: string, error: unknown): never {
  console.error(`❌ ${action} failed:`, error instanceof Error ? error.message : String(error));
  process.exit(1);
}

program
  .command('dump')
  .description('Print every package, type, configuration and resource')
  .argument('<file>', 'Path to a resources.arsc file')
  .action(async (file: string) => {
    try {
      const table = await loadTable(file);
      for (const resPackage of table.getPackages()) {
        console.log(`Package 0x${resPackage.id.toString(16).padStart(2, '0')} ${resPackage.name}`);
        for (const type of resPackage.types) {
          console.log(`  Type ${type.name} (id ${type.id})`);
          for (const configuration of type.configurations) {
            console.log(`    Config ${formatConfig(configuration.config)}`);
            for (const resource of configuration.resources) {
              console.log(`      ${formatResource(resource)}`);
            }
          }
        }
      }
    } catch (error) {
      fail('Dump', error);
    }
  });

program
  .command('find')
  .description('Print the values of a resource id in every configuration')
  .argument('<file>', 'Path to a resources.arsc file')
  .argument('<id>', 'Resource id, hex (0x7f010000) or decimal')
  .action(async (file: string, idText: string) => {
    try {
      const resourceId = parseResourceIdText(idText);
      if (resourceId === null) {
        throw new Error(`Not a resource id: ${idText}`);
      }
      const table = await loadTable(file);
      const resources: Resource[] = table.findAllResources(resourceId);
      if (resources.length === 0) {
        console.log(`No resource with id ${formatResourceId(resourceId)}`);
        process.exitCode = 2;
        return;
      }
      for (const resource of resources) {
        console.log(formatResource(resource));
      }
    } catch (error) {
      fail('Find', error);
    }
  });

program
  .command('string')
  .description('Print the value of a string resource')
  .argument('<file>', 'Path to a resources.arsc file')
  .argument('<name>', 'Resource name')
  .action(async (file: string, name: string) => {
    try {
      const table = await loadTable(file);
      const value = table.findStringResource(name);
      if (value === null) {
        console.log(`No string resource named ${name}`);
        process.exitCode = 2;
        return;
      }
      console.log(value);
    } catch (error) {
      fail('String lookup', error);
    }
  });

program
  .command('type')
  .description('Print every resource of a type, one per name')
  .argument('<file>', 'Path to a resources.arsc file')
  .argument('<type>', 'Type name, e.g. string or color')
  .action(async (file: string, typeName: string) => {
    try {
      const table = await loadTable(file);
      for (const resource of table.findResourcesByType(typeName)) {
        console.log(formatResource(resource));
      }
    } catch (error) {
      fail('Type listing', error);
    }
  });

program.parse();
