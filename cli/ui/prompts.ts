import inquirer from 'inquirer'
import chalk from 'chalk'
import { MEMORY_MENU, VERSION_MENU } from '../../engines/mongodb/version-maps'
import { validateAppName } from '../../engines/mongodb/config-templates'
import type { InstallPrompter } from '../../core/install-workflow'
import type { Credentials, MenuOption } from '../../types'
import { warning } from './theme'

/**
 * Prompt for confirmation using arrow-key selection
 */
export async function promptConfirm(
  message: string,
  defaultValue: boolean = true,
): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: string }>([
    {
      type: 'list',
      name: 'confirmed',
      message,
      choices: [
        { name: 'Yes', value: 'yes' },
        { name: 'No', value: 'no' },
      ],
      default: defaultValue ? 'yes' : 'no',
    },
  ])

  return confirmed === 'yes'
}

/**
 * Prompt for a menu entry; resolves to the entry's key
 */
export async function promptMenu<T>(
  message: string,
  menu: readonly MenuOption<T>[],
): Promise<string> {
  const { choice } = await inquirer.prompt<{ choice: string }>([
    {
      type: 'list',
      name: 'choice',
      message,
      choices: menu.map((option) => ({
        name: `${option.key}) ${option.label}`,
        value: option.key,
        short: option.label,
      })),
    },
  ])
  return choice
}

export async function promptAppName(): Promise<string> {
  const { name } = await inquirer.prompt<{ name: string }>([
    {
      type: 'input',
      name: 'name',
      message: 'Enter a name for the PM2 app:',
      validate: (input: string) => validateAppName(input.trim()) ?? true,
    },
  ])
  return name.trim()
}

/**
 * Username in clear, password masked
 */
export async function promptCredentials(
  usernameMessage: string,
  passwordMessage: string,
): Promise<Credentials> {
  const { username, password } = await inquirer.prompt<{
    username: string
    password: string
  }>([
    {
      type: 'input',
      name: 'username',
      message: usernameMessage,
    },
    {
      type: 'password',
      name: 'password',
      message: passwordMessage,
      mask: '*',
    },
  ])
  return { username, password }
}

export type PresetAnswers = {
  version?: string
  memory?: string
  appName?: string
}

/**
 * Interactive prompter for the install workflow. Answers given as flags
 * skip their prompt and are validated by the workflow like typed input.
 */
export class InquirerPrompter implements InstallPrompter {
  private presets: PresetAnswers
  private beforePrompt: () => void

  constructor(presets: PresetAnswers = {}, beforePrompt: () => void = () => {}) {
    this.presets = presets
    this.beforePrompt = beforePrompt
  }

  async confirmBackup(): Promise<boolean> {
    this.beforePrompt()
    console.log(chalk.yellow('Existing MongoDB database found.'))
    return promptConfirm('Do you want to back it up before overwriting?')
  }

  async selectVersion(): Promise<string> {
    if (this.presets.version !== undefined) return this.presets.version
    this.beforePrompt()
    return promptMenu('Select MongoDB version to install:', VERSION_MENU)
  }

  async selectMemory(): Promise<string> {
    if (this.presets.memory !== undefined) return this.presets.memory
    this.beforePrompt()
    return promptMenu('Select memory limit for MongoDB:', MEMORY_MENU)
  }

  async appName(): Promise<string> {
    if (this.presets.appName !== undefined) return this.presets.appName
    this.beforePrompt()
    return promptAppName()
  }

  async adminCredentials(): Promise<Credentials> {
    this.beforePrompt()
    console.log(chalk.bold('Creating new root user.'))
    return promptCredentials('Enter new username:', 'Enter new password:')
  }

  async confirmLimitedUser(): Promise<boolean> {
    this.beforePrompt()
    console.log(
      warning(
        'It is recommended to create a new user with read/write permissions.',
      ),
    )
    return promptConfirm(
      'Do you want to create a new user with limited permissions?',
    )
  }

  async limitedCredentials(): Promise<Credentials> {
    this.beforePrompt()
    return promptCredentials(
      'Enter new username for limited access:',
      'Enter password for new user:',
    )
  }
}
