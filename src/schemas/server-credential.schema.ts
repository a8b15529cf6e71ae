import { z } from 'zod';

// <server> entry of a Maven settings file
export const ServerCredentialSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
  password: z.string(),
});

export type ServerCredential = z.infer<typeof ServerCredentialSchema>;
