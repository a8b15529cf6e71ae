// src/security/credentials.ts
import { ServerCredentialSchema } from '../schemas/index.js';
import type { DeployEnv, ServerCredential } from '../schemas/index.js';

// Server id referenced by the deployment repositories of the parent POM
export const OSSRH_SERVER_ID = 'ossrh';

export function readServerCredentials(
  env: DeployEnv,
  serverId: string = OSSRH_SERVER_ID
): ServerCredential {
  if (env.SONATYPE_USERNAME === undefined) {
    throw new Error('Missing environment variable: SONATYPE_USERNAME');
  }
  if (env.SONATYPE_PASSWORD === undefined) {
    throw new Error('Missing environment variable: SONATYPE_PASSWORD');
  }

  return ServerCredentialSchema.parse({
    id: serverId,
    username: env.SONATYPE_USERNAME,
    password: env.SONATYPE_PASSWORD,
  });
}
