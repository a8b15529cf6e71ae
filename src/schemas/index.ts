export { DeployEnvSchema, parseDeployEnv, isSecureEnvAvailable } from './deploy-env.schema.js';
export type { DeployEnv } from './deploy-env.schema.js';
export { ServerCredentialSchema } from './server-credential.schema.js';
export type { ServerCredential } from './server-credential.schema.js';
