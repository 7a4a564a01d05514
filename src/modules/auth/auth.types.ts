import { z } from 'zod';

import { roleSchema } from '../identity/identity.types.js';

export const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  tenant_id: z.string().min(1),
  role: roleSchema,
  iat: z.number().int(),
  exp: z.number().int(),
  iss: z.string().min(1),
});

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

export const issueTokenSchema = z.object({
  tenantId: z.string().uuid(),
  subjectId: z.string().uuid(),
});

export type IssueTokenInput = z.infer<typeof issueTokenSchema>;

export interface IssuedToken {
  token: string;
  tokenType: 'Bearer';
  expiresIn: number;
  expiresAt: string;
}
