/**
 * Fixed values for a provisioned MongoDB instance.
 *
 * Anything the operator can change at run time lives in ProvisionContext;
 * these are the constants that never vary between runs.
 */
export const defaults = {
  // Port is the same for every run, regardless of version or memory choice
  port: 5679,

  // Directory under the home directory that holds the whole installation
  rootDirName: 'mongodb',

  // Directory under the home directory for provisioner logs
  logDirName: '.mongo-provision',

  configFileName: 'mongo.cfg',
  installRecordFileName: 'provision.json',
  profileFileName: '.bash_profile',
  binaryLinkName: 'mongodb-binary',

  // Database the limited read/write user is scoped to
  limitedDatabase: 'my-database',

  // Helper that prints the account's loopback address on the hosting platform
  loopbackCommand: 'vs-loopback-ip',
  loopbackArgs: ['-4'],

  // Process name matched by the preflight guard
  engineProcessName: 'mongod',

  processManagerCommand: 'pm2',

  // Download timeout per archive
  downloadTimeoutMs: 5 * 60 * 1000,

  // Readiness polling after a standalone start
  readyTimeoutMs: 30_000,
  readyIntervalMs: 500,
} as const

export const hosts = {
  engine: 'https://fastdl.mongodb.org/linux',
  shell: 'https://downloads.mongodb.com/compass',
  tools: 'https://fastdl.mongodb.org/tools/db',
} as const

export const shellRelease = {
  version: '1.5.2',
  platform: 'linux-x64',
} as const

export const toolsRelease = {
  version: '100.5.4',
  platform: 'rhel80-x86_64',
} as const

export const envVars = {
  home: 'MONGO_PROVISION_HOME',
  bindIp: 'MONGO_PROVISION_BIND_IP',
} as const
