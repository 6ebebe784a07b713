#!/usr/bin/env node
import { Command } from 'commander'
import { registerInitCommand } from './commands/init.js'
import { registerMigrateCommand } from './commands/migrate.js'
import { registerStatusCommand } from './commands/status.js'

const program = new Command()

program
  .name('typed-sqlite')
  .description('Apply and inspect SQLite schema migrations')
  .version('0.1.0')

registerInitCommand(program)
registerMigrateCommand(program)
registerStatusCommand(program)

export { program }

program.parse()
