#!/usr/bin/env node
import { Command } from 'commander';
import { auditReferences, checkReferences, CommandResult, describeLayer, listLayers, printResult } from './cli/commands';
import { DECLARED_REFERENCES } from './geometry/references';
import { Logger } from './utils/logger';

const program = new Command();

program
  .name('scheme-layers')
  .description('Inspect and check the load order of the geometric entity types')
  .version('0.1.0')
  .option('--debug', 'Print debug logging');

program.hook('preAction', () => {
  if (program.opts<{ debug?: boolean }>().debug) {
    Logger.setDebug(true);
  }
});

function emit(result: CommandResult) {
  process.exitCode = printResult(result);
}

program
  .command('layers')
  .description('Print the layer table')
  .action(() => emit(listLayers()));

program
  .command('layer')
  .description('Print the layer of one entity type')
  .argument('<name>', 'Entity type (e.g., Scheme)')
  .action((name: string) => emit(describeLayer(name)));

program
  .command('check')
  .description('Validate the eager references of the geometric units')
  .action(() => emit(checkReferences(DECLARED_REFERENCES)));

program
  .command('audit')
  .description('Report deferred references that need a second look')
  .action(() => emit(auditReferences(DECLARED_REFERENCES)));

if (process.argv.length <= 2) {
  program.help();
}

program.parse();
