import { Command } from 'commander'
import chalk from 'chalk'
import { ConfigManager } from '../../core/config-manager'
import { createProvisionContext } from '../../core/provision-context'
import { isEngineRunning } from '../../core/preflight'
import { ProvisionError, logProvisionError } from '../../core/error-handler'
import { keyValue, theme, warning } from '../ui/theme'

export const infoCommand = new Command('info')
  .description('Show the last provisioned installation')
  .option('--home <dir>', 'Installation home directory')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { home?: string; json?: boolean }) => {
    try {
      const ctx = createProvisionContext({ home: options.home })
      const record = await new ConfigManager(ctx.paths.installRecord).load()

      if (!record) {
        if (options.json) {
          console.log(JSON.stringify({ installed: false }))
        } else {
          console.log(warning(`No installation found under ${ctx.paths.root}`))
        }
        return
      }

      const running = await isEngineRunning()

      if (options.json) {
        console.log(JSON.stringify({ installed: true, running, ...record }, null, 2))
        return
      }

      console.log(
        [
          keyValue('App', theme.appName(record.appName)),
          keyValue('Version', theme.version(`${record.series} (${record.version})`)),
          keyValue('Memory limit', record.memory),
          keyValue('Address', theme.port(`${record.bindIp}:${record.port}`)),
          keyValue('Config', theme.path(record.configPath)),
          keyValue('pm2 descriptor', theme.path(record.descriptorPath)),
          keyValue('mongod', running ? chalk.green('● running') : chalk.gray('○ stopped')),
          keyValue('Installed', record.installedAt),
          ...(record.backupPath
            ? [keyValue('Last backup', theme.path(record.backupPath))]
            : []),
          ...record.users.map((user) =>
            keyValue(
              'User',
              `${user.username} (${user.role})${user.created ? '' : chalk.yellow(' not created')}`,
            ),
          ),
        ].join('\n'),
      )
    } catch (err) {
      logProvisionError(ProvisionError.from(err))
      process.exit(1)
    }
  })
