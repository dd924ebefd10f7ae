import { z } from 'zod';

export const idctaConfigSchema = z.object({
  signin_url: z.string().url(),
  identity: z.object({
    cookieAgeDays: z.number().int(),
    accessTokenCookieName: z.string(),
    idSignedInCookieName: z.string(),
  }),
});

// window.bbcAccount.locals on the sign-in page
export const accountLocalsSchema = z.object({
  userOrigin: z.string(),
  nonce: z.string(),
  ptrt: z.object({
    value: z.string(),
  }),
});
