import { JWT } from "google-auth-library";
import { z } from "zod";

/**
 * Service account key fields needed for domain-wide delegation.
 */
export const googleAuthSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export type GoogleAuth = z.infer<typeof googleAuthSchema>;

/**
 * Supplies a bearer token for each request.
 */
export type TokenProvider = () => Promise<string>;

/**
 * OAuth2 token provider acting as `delegatedAdminEmail`.
 */
export const createGoogleTokenProvider = (
  auth: GoogleAuth,
  delegatedAdminEmail: string,
  scopes: string[],
): TokenProvider => {
  const client = new JWT({
    email: auth.client_email,
    key: auth.private_key,
    scopes,
    subject: delegatedAdminEmail,
  });

  return async () => {
    const { token } = await client.getAccessToken();
    if (!token) {
      throw new Error(`No access token issued for ${delegatedAdminEmail}`);
    }
    return token;
  };
};
