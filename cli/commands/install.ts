import { Command } from 'commander'
import chalk from 'chalk'
import { runInstall } from '../../core/install-workflow'
import { createProvisionContext } from '../../core/provision-context'
import { envVars } from '../../config/defaults'
import {
  ProvisionError,
  logProvisionError,
} from '../../core/error-handler'
import { InquirerPrompter } from '../ui/prompts'
import { ProgressReporter } from '../ui/spinner'
import { header, nextStepsBox, success, warning } from '../ui/theme'

type InstallOptions = {
  mongoVersion?: string
  memory?: string
  appName?: string
  bindIp?: string
  home?: string
  database?: string
  requireChecksum?: boolean
  start: boolean
}

export const installCommand = new Command('install')
  .description('Install MongoDB, generate its config and pm2 app, create users')
  .option('--mongo-version <choice>', 'Version menu choice (1 = 6.0, 2 = 7.0)')
  .option(
    '--memory <choice>',
    'Memory menu choice (1 = 256M, 2 = 512M, 3 = 1G, 4 = 2G, 5 = 3G)',
  )
  .option('--app-name <name>', 'Name of the pm2 app')
  .option('--bind-ip <ip>', 'Bind address instead of the loopback helper')
  .option('--home <dir>', 'Install under this directory instead of $HOME')
  .option('--database <name>', 'Database for the limited read/write user')
  .option('--require-checksum', 'Fail when an archive has no published checksum')
  .option('--no-start', 'Do not start the pm2 app after provisioning')
  .action(async (options: InstallOptions) => {
    const progress = new ProgressReporter()
    try {
      if (options.home) {
        // error-handler resolves its log directory from the environment
        process.env[envVars.home] = options.home
      }

      const ctx = createProvisionContext({
        home: options.home,
        bindIp: options.bindIp,
        database: options.database,
        requireChecksum: options.requireChecksum,
        start: options.start,
      })

      console.log(header('MongoDB provisioning'))
      console.log()

      const prompter = new InquirerPrompter(
        {
          version: options.mongoVersion,
          memory: options.memory,
          appName: options.appName,
        },
        () => progress.succeed(),
      )

      const summary = await runInstall(ctx, {
        prompter,
        onProgress: progress.onProgress,
      })
      progress.succeed()

      if (summary.reset.backup) {
        console.log(success(`Backup written to ${summary.reset.backup.path}`))
      }
      for (const line of summary.install.profileLinesAdded) {
        console.log(success(`Added to ${ctx.paths.profile}: ${chalk.gray(line)}`))
      }
      for (const user of summary.users) {
        const role = `${user.role.role}@${user.role.db}`
        console.log(
          user.created
            ? success(`Created user ${chalk.bold(user.username)} (${role})`)
            : warning(`User ${user.username} (${role}) was not created`),
        )
      }

      console.log()
      console.log(
        nextStepsBox({
          appName: summary.record.appName,
          descriptorPath: summary.record.descriptorPath,
          bindIp: summary.record.bindIp,
          port: summary.record.port,
          started: summary.record.started,
        }),
      )
    } catch (err) {
      progress.fail()
      logProvisionError(ProvisionError.from(err))
      process.exit(1)
    }
  })
