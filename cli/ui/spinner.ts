import ora, { type Ora } from 'ora'
import type { ProgressCallback } from '../../types'

/**
 * Create a spinner with consistent styling
 */
export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  })
}

/**
 * Spinner that follows workflow progress events: each new message
 * completes the previous step and starts a spinner for the next one.
 */
export class ProgressReporter {
  private spinner: Ora | null = null

  readonly onProgress: ProgressCallback = ({ message }) => {
    this.succeed()
    this.spinner = createSpinner(message)
    this.spinner.start()
  }

  /**
   * Complete the active step, e.g. before handing the terminal to a prompt
   */
  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text)
      this.spinner = null
    }
  }

  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text)
      this.spinner = null
    }
  }
}
