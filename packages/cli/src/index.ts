#!/usr/bin/env node
import { Command } from 'commander'
import { compileCommand } from './commands/compile.js'
import { verifyCommand } from './commands/verify.js'
import { validateCommand } from './commands/validate.js'
import { targetsCommand } from './commands/targets.js'

const program = new Command()

program
  .name('ctpl')
  .description('Compile ConstraintTemplates into constraint CRDs and validate constraints')
  .version('0.1.0')

program
  .command('compile <template>')
  .description('Print the CustomResourceDefinition generated from a template')
  .option('--json', 'Output as JSON instead of YAML')
  .option('--config <path>', 'Path to ctpl.yaml')
  .action(async (template, options) => {
    const result = await compileCommand(template, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('verify <template>')
  .description('Run registration checks on a template')
  .option('--json', 'Output as JSON')
  .option('--config <path>', 'Path to ctpl.yaml')
  .action(async (template, options) => {
    const result = await verifyCommand(template, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.passed) {
      process.exit(1)
    }
  })

program
  .command('validate <constraints>')
  .description('Validate constraint documents against a template')
  .requiredOption('--template <file>', 'ConstraintTemplate that defines the constraint kind')
  .option('--json', 'Output as JSON')
  .option('--config <path>', 'Path to ctpl.yaml')
  .action(async (constraints, options) => {
    const result = await validateCommand(constraints, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (result.value.summary.invalid > 0) {
      process.exit(1)
    }
  })

program
  .command('targets')
  .description('List the targets templates can name')
  .option('--json', 'Output as JSON')
  .option('--config <path>', 'Path to ctpl.yaml')
  .action(async (options) => {
    const result = await targetsCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program.parse()
