#!/usr/bin/env node
import { Command } from 'commander';
import { MIGRATION_STEPS } from '../migration/steps/index.js';
import { migrateCommand } from './commands/migrate.js';
import { createStepCommand } from './commands/step.js';
import { listStepsCommand } from './commands/list-steps.js';
import { validateCommand } from './commands/validate.js';

const program = new Command();

program
  .name('level-migrate')
  .description('Migrate laser level files to the canonical endpoint-path schema')
  .version('0.1.0');

for (const step of MIGRATION_STEPS) {
  program.addCommand(createStepCommand(step));
}
program.addCommand(migrateCommand);
program.addCommand(listStepsCommand);
program.addCommand(validateCommand);

program.parse();
