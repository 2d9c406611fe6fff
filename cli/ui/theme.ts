import chalk from 'chalk'

/**
 * Color theme for the mongo-provision CLI
 */
export const theme = {
  appName: chalk.cyan.bold,
  version: chalk.yellow,
  port: chalk.green,
  path: chalk.gray,

  icons: {
    success: chalk.green('✔'),
    warning: chalk.yellow('⚠'),
  },
}

/**
 * Format a header box
 */
export function header(text: string): string {
  const line = '─'.repeat(text.length + 4)
  return `
${chalk.cyan('┌' + line + '┐')}
${chalk.cyan('│')}  ${chalk.bold(text)}  ${chalk.cyan('│')}
${chalk.cyan('└' + line + '┘')}
`.trim()
}

export function success(message: string): string {
  return `${theme.icons.success} ${message}`
}

export function warning(message: string): string {
  return `${theme.icons.warning} ${chalk.yellow(message)}`
}

export function keyValue(key: string, value: string): string {
  return `${chalk.gray(key + ':')} ${value}`
}

/**
 * Strip ANSI escape codes to get the visible string length
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '')
}

function padToWidth(str: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(str).length)
  return str + ' '.repeat(padding)
}

/**
 * Create a box sized to its widest line
 */
export function box(lines: string[], padding: number = 2): string {
  const maxWidth = Math.max(...lines.map((line) => stripAnsi(line).length))
  const horizontalLine = '─'.repeat(maxWidth + padding * 2)

  const boxLines = [chalk.cyan('┌' + horizontalLine + '┐')]
  for (const line of lines) {
    boxLines.push(
      chalk.cyan('│') +
        ' '.repeat(padding) +
        padToWidth(line, maxWidth) +
        ' '.repeat(padding) +
        chalk.cyan('│'),
    )
  }
  boxLines.push(chalk.cyan('└' + horizontalLine + '┘'))

  return boxLines.join('\n')
}

/**
 * Closing summary: where the pm2 app lives and how to register it
 */
export function nextStepsBox(options: {
  appName: string
  descriptorPath: string
  bindIp: string
  port: number
  started: boolean
}): string {
  const { appName, descriptorPath, bindIp, port, started } = options
  const lines = [
    `${theme.icons.success} MongoDB app ${chalk.bold(appName)} is provisioned`,
    '',
    `${chalk.gray('Listening on:')} ${chalk.green(`${bindIp}:${port}`)}`,
    `${chalk.gray('pm2 descriptor:')} ${descriptorPath}`,
    '',
    started
      ? chalk.gray('pm2 is supervising the process now.')
      : chalk.gray(`Start it with: pm2 start ${descriptorPath}`),
    chalk.gray('Register the descriptor as a PM2 app in your hosting panel'),
    chalk.gray('so it survives server restarts.'),
  ]
  return box(lines)
}
