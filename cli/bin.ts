#!/usr/bin/env tsx

import { run } from './index'
import { ProvisionError, logProvisionError } from '../core/error-handler'

run().catch((err: unknown) => {
  logProvisionError(ProvisionError.from(err))
  process.exit(1)
})
