import { program } from 'commander'
import { createRequire } from 'module'
import { installCommand } from './commands/install'
import { infoCommand } from './commands/info'

const require = createRequire(import.meta.url)
const pkg = require('../package.json') as { version: string }

export async function run(): Promise<void> {
  program
    .name('mongo-provision')
    .description(
      'Provision a single-node MongoDB under pm2 on a shared hosting account',
    )
    .version(pkg.version, '-v, --version', 'output the version number')

  program.addCommand(installCommand, { isDefault: true })
  program.addCommand(infoCommand)

  await program.parseAsync()
}
